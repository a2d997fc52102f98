import { extractLogReferences } from '../../../src/diagnostics/log-references.js';

describe('extractLogReferences', () => {
  it('extracts the path between the marker and the closing parenthesis', () => {
    const refs = extractLogReferences(['FAIL: //:IntegrationTest (see /tmp/x/test.log)']);
    expect(refs).toEqual([{ path: '/tmp/x/test.log', line: 0, column: 25 }]);
  });

  it('returns references in textual scan order across and within lines', () => {
    const refs = extractLogReferences([
      'INFO: Build completed',
      'FAIL: //:a (see /logs/a.log) and //:b (see /logs/b.log)',
      'FAIL: //:c (see logs/c.log)',
    ]);
    expect(refs.map(r => r.path)).toEqual(['/logs/a.log', '/logs/b.log', 'logs/c.log']);
    expect(refs.map(r => r.line)).toEqual([1, 1, 2]);
  });

  it('ignores a marker without a closing parenthesis or with an empty path', () => {
    expect(extractLogReferences(['FAIL: //:a (see /logs/a.log', 'odd (see )'])).toEqual([]);
  });

  it('ignores lines without the exact marker', () => {
    expect(extractLogReferences(['see /logs/a.log', '(See /logs/b.log)', '(see/logs/c.log)'])).toEqual([]);
  });

  it('returns nothing for empty stderr', () => {
    expect(extractLogReferences([])).toEqual([]);
  });
});

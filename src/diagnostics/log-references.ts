// The build tool points at secondary logs with "(see <path>)" in its stderr.
// This is the only place that knows the convention; swap it here for a structured format.

export const LOG_REFERENCE_MARKER = '(see ';
const LOG_REFERENCE_END = ')';

export interface LogReference {
  path: string;
  // Index of the stderr line and offset of the marker within it.
  line: number;
  column: number;
}

/** All references in textual scan order: line by line, left to right. */
export function extractLogReferences(stderrLines: readonly string[]): LogReference[] {
  const refs: LogReference[] = [];
  stderrLines.forEach((text, line) => {
    let from = 0;
    for (;;) {
      const column = text.indexOf(LOG_REFERENCE_MARKER, from);
      if (column === -1) break;
      const pathStart = column + LOG_REFERENCE_MARKER.length;
      const end = text.indexOf(LOG_REFERENCE_END, pathStart);
      if (end === -1) break;
      const refPath = text.slice(pathStart, end).trim();
      if (refPath) refs.push({ path: refPath, line, column });
      from = end + LOG_REFERENCE_END.length;
    }
  });
  return refs;
}

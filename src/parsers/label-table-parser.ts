/**
 * Label Table Parser
 *
 * Pulls label names out of the first Markdown table that follows a header
 * marker, e.g.
 *
 *   | Label Name | Color Hex | Category |
 *   |------------|-----------|----------|
 *   | bug        | #d73a4a   | Type     |
 */

export const TABLE_SEPARATOR_PREFIX = '|---';
export const HEADER_PLACEHOLDER = 'Label Name';

// "", name, color, category, "" once split on "|"
const MIN_CELLS = 4;

/**
 * Scan `content` line by line. The marker line switches the table on; the
 * first non-empty line that does not start with "|" ends the scan for good.
 * Blank lines inside the table are ignored.
 */
export function parseLabelTable(content: string, tableHeader: string): string[] {
  const documentedLabels: string[] = [];
  let inTable = false;

  for (const line of content.split('\n')) {
    if (line.includes(tableHeader)) {
      inTable = true;
      continue;
    }
    if (!inTable) {
      continue;
    }
    if (line.startsWith(TABLE_SEPARATOR_PREFIX)) {
      continue;
    }

    if (line.startsWith('|')) {
      const cells = line.split('|').map((cell) => cell.trim());
      if (cells.length >= MIN_CELLS) {
        const labelName = cells[1];
        // A repeated header row is not a label
        if (labelName && labelName !== HEADER_PLACEHOLDER) {
          documentedLabels.push(labelName);
        }
      }
      continue;
    }

    if (line !== '') {
      break;
    }
  }

  return documentedLabels;
}

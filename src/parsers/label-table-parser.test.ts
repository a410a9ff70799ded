/**
 * Tests for the Markdown label table parser
 */

import { parseLabelTable } from './label-table-parser';

const HEADER = '| Label Name | Color Hex | Category |';

function doc(...lines: string[]): string {
  return lines.join('\n');
}

describe('parseLabelTable', () => {
  it('extracts label names in document order', () => {
    const content = doc(
      '# Labels',
      HEADER,
      '|------------|-----------|----------|',
      '| bug | #d73a4a | Type |',
      '| enhancement | #a2eeef | Type |',
      '| priority-high | #b60205 | Priority |'
    );

    expect(parseLabelTable(content, HEADER)).toEqual(['bug', 'enhancement', 'priority-high']);
  });

  it('returns the same list when parsing the same document twice', () => {
    const content = doc(HEADER, '|---|---|---|', '| bug | #d73a4a | Type |', '| task | #cccccc | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual(parseLabelTable(content, HEADER));
  });

  it('ignores pipe rows before the header marker', () => {
    const content = doc('| stray | #000000 | Other |', HEADER, '| bug | #d73a4a | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual(['bug']);
  });

  it('yields nothing when prose follows the header marker directly', () => {
    const content = doc(HEADER, 'This table is coming soon.', '| bug | #d73a4a | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual([]);
  });

  it('excludes a repeated header row', () => {
    const content = doc(
      HEADER,
      '|---|---|---|',
      '| bug | #d73a4a | Type |',
      '| Label Name | Color | Category |',
      '| task | #cccccc | Type |'
    );

    expect(parseLabelTable(content, HEADER)).toEqual(['bug', 'task']);
  });

  it('skips rows with fewer than four cells', () => {
    const content = doc(
      HEADER,
      '| bug | #d73a4a | Type |',
      '| broken |',
      '|only-one',
      '| half | row',
      '| task | #cccccc | Type |'
    );

    // "| half | row" splits into ['', 'half', 'row'] and is skipped too
    expect(parseLabelTable(content, HEADER)).toEqual(['bug', 'task']);
  });

  it('skips rows with an empty name cell', () => {
    const content = doc(HEADER, '|  | #d73a4a | Type |', '| bug | #d73a4a | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual(['bug']);
  });

  it('keeps scanning across blank lines inside the table', () => {
    const content = doc(HEADER, '| bug | #d73a4a | Type |', '', '| task | #cccccc | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual(['bug', 'task']);
  });

  it('stops at the first non-table line and never resumes', () => {
    const content = doc(
      HEADER,
      '| bug | #d73a4a | Type |',
      'Second table:',
      HEADER,
      '| task | #cccccc | Type |'
    );

    expect(parseLabelTable(content, HEADER)).toEqual(['bug']);
  });

  it('keeps duplicates', () => {
    const content = doc(HEADER, '| bug | #d73a4a | Type |', '| bug | #d73a4a | Type |');

    expect(parseLabelTable(content, HEADER)).toEqual(['bug', 'bug']);
  });

  it('returns an empty list when the marker is absent', () => {
    expect(parseLabelTable(doc('| bug | #d73a4a | Type |'), HEADER)).toEqual([]);
  });

  it('supports a custom header marker', () => {
    const content = doc('| Name | Hex | Group |', '| wontfix | #ffffff | Status |');

    expect(parseLabelTable(content, '| Name | Hex |')).toEqual(['wontfix']);
  });
});

/**
 * Length in Unicode code points, the unit PostgreSQL's varchar(n) counts.
 * `String.length` counts UTF-16 units, so one emoji would count twice.
 */
export function characterCount(text: string): number {
  return [...text].length;
}

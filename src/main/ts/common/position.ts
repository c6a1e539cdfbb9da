export interface Position {
  line: number;
  column: number;
  offset: number;
}

export const START: Position = { line: 1, column: 1, offset: 0 };

export function formatPosition(pos: Position, sourceName?: string): string {
  const where = `${pos.line}:${pos.column}`;
  return sourceName ? `${sourceName}:${where}` : where;
}

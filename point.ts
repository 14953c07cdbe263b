/** A cell on the board: x is the column, y the row, (0,0) is the top left. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export namespace Point {
  export function of(x: number, y: number): Point {
    return {x, y};
  }

  export function equals(a: Point, b: Point): boolean {
    return a.x === b.x && a.y === b.y;
  }

  export function show(p: Point): string {
    return `(${p.x}, ${p.y})`;
  }
}

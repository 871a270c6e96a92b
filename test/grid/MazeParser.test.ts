import { MazeFormatError } from '../../src/core/errors';
import { parseMaze, SIMPLE_MAZE, STUDENT_MAZE } from '../../src/grid/MazeParser';

describe('parseMaze', () => {
  it('puts row 0 at the top of the grid', () => {
    expect(parseMaze(['S.#', '...'])).toEqual({
      width: 3,
      height: 2,
      walls: [{ x: 2, y: 1 }],
      start: { x: 0, y: 1 },
    });
  });

  it('accepts rows as arrays of cells', () => {
    const layout = parseMaze([
      ['.', '#'],
      ['S', '.'],
    ]);

    expect(layout.walls).toEqual([{ x: 1, y: 1 }]);
    expect(layout.start).toEqual({ x: 0, y: 0 });
  });

  it('treats unknown symbols as floor and reports a missing start as null', () => {
    expect(parseMaze(['.o', 'x.'])).toEqual({ width: 2, height: 2, walls: [], start: null });
  });

  it('counts a cell by characters, not code units', () => {
    expect(parseMaze([['🧱', 'S']])).toEqual(parseMaze(['🧱S']));
    expect(parseMaze([['🧱', 'S']]).start).toEqual({ x: 1, y: 0 });
  });

  it('parses the bundled mazes', () => {
    const simple = parseMaze(SIMPLE_MAZE);
    expect(simple.width).toBe(7);
    expect(simple.height).toBe(5);
    expect(simple.walls).toHaveLength(10);
    expect(simple.start).toBeNull();

    const student = parseMaze(STUDENT_MAZE);
    expect(student.width).toBe(8);
    expect(student.height).toBe(8);
    expect(student.walls).toHaveLength(16);
    expect(student.start).toEqual({ x: 0, y: 7 });
  });

  describe('malformed layouts', () => {
    it('rejects an empty layout', () => {
      expect(() => parseMaze([])).toThrow('Maze layout is empty');
      expect(() => parseMaze([''])).toThrow(MazeFormatError);
    });

    it('rejects ragged rows', () => {
      expect(() => parseMaze(['...', '..'])).toThrow('Maze row 1 has 2 cells, expected 3 like row 0');
    });

    it('rejects multi-character cells', () => {
      expect(() => parseMaze([['.', '##']])).toThrow("Maze cell (1, 0) must be one character, got '##'");
    });

    it('rejects a second start marker', () => {
      expect(() => parseMaze(['S.', '.S'])).toThrow(
        'Maze has more than one start marker: (0, 1) and (1, 0)'
      );
    });
  });
});

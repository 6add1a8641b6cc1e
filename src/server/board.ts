import {
  BINGO_BONUS,
  BLANK,
  BOARD_SIZE,
  CENTER,
  LETTERS,
  LETTER_VALUES,
  RACK_SIZE
} from "../shared/constants.js";
import type { Board, BoardSquare, Premium, SquareCoordinate } from "../shared/gameTypes.js";
import type { BoardEngine, Dictionary, PlacementResult } from "./types.js";

// top-left quadrant, mirrored onto the other three
const PREMIUM_QUADRANT: Array<[number, number, Premium]> = [
  [0, 0, "tripleWord"],
  [0, 7, "tripleWord"],
  [7, 0, "tripleWord"],
  [1, 1, "doubleWord"],
  [2, 2, "doubleWord"],
  [3, 3, "doubleWord"],
  [4, 4, "doubleWord"],
  [7, 7, "doubleWord"],
  [1, 5, "tripleLetter"],
  [5, 1, "tripleLetter"],
  [5, 5, "tripleLetter"],
  [0, 3, "doubleLetter"],
  [3, 0, "doubleLetter"],
  [2, 6, "doubleLetter"],
  [6, 2, "doubleLetter"],
  [3, 7, "doubleLetter"],
  [7, 3, "doubleLetter"],
  [6, 6, "doubleLetter"]
];

interface Direction {
  dr: number;
  dc: number;
}

const ACROSS: Direction = { dr: 0, dc: 1 };
const DOWN: Direction = { dr: 1, dc: 0 };
const NEIGHBOURS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
];

export function createBoard(): Board {
  const board: Board = Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, (): BoardSquare => ({ premium: "none" }))
  );
  const last = BOARD_SIZE - 1;
  PREMIUM_QUADRANT.forEach(([row, col, premium]) => {
    [row, last - row].forEach((r) => {
      [col, last - col].forEach((c) => {
        board[r][c].premium = premium;
      });
    });
  });
  return board;
}

export class StandardBoardEngine implements BoardEngine {
  constructor(private readonly dictionary: Dictionary) {}

  createBoard(): Board {
    return createBoard();
  }

  tryPlace(
    board: Board,
    startPos: SquareCoordinate,
    endPos: SquareCoordinate,
    tiles: string[],
    blanks: string[]
  ): PlacementResult {
    if (!inBounds(startPos) || !inBounds(endPos)) {
      return fail("Placement is outside the board.");
    }
    if (!tiles.length) {
      return fail("Select tiles to play.");
    }
    let direction: Direction;
    if (startPos.row === endPos.row) {
      direction = ACROSS;
    } else if (startPos.col === endPos.col) {
      direction = DOWN;
    } else {
      return fail("Tiles must be placed in a single row or column.");
    }
    const [from, to] = squareIndex(startPos) <= squareIndex(endPos) ? [startPos, endPos] : [endPos, startPos];

    const next = cloneBoard(board);
    const placed: SquareCoordinate[] = [];
    let tileIndex = 0;
    let blankIndex = 0;
    let spansExisting = false;
    for (
      let row = from.row, col = from.col;
      row <= to.row && col <= to.col;
      row += direction.dr, col += direction.dc
    ) {
      const square = next[row][col];
      if (square.tile) {
        spansExisting = true;
        continue;
      }
      if (tileIndex >= tiles.length) {
        return fail("Not enough tiles to fill the selected squares.");
      }
      const raw = tiles[tileIndex];
      tileIndex += 1;
      let letter = raw.toUpperCase();
      let blank = false;
      if (letter === BLANK) {
        const chosen = blankIndex < blanks.length ? blanks[blankIndex].toUpperCase() : "";
        blankIndex += 1;
        if (chosen.length !== 1 || !LETTERS.includes(chosen)) {
          return fail("Each blank tile needs a letter.");
        }
        letter = chosen;
        blank = true;
      } else if (letter.length !== 1 || !LETTERS.includes(letter)) {
        return fail(`"${raw}" is not a valid tile.`);
      }
      square.tile = { letter, blank };
      placed.push({ row, col });
    }
    if (tileIndex < tiles.length) {
      return fail("Too many tiles for the selected squares.");
    }

    const firstMove = !board.some((row) => row.some((square) => square.tile));
    if (firstMove) {
      if (!placed.some((pos) => pos.row === CENTER && pos.col === CENTER)) {
        return fail("The first word must cover the centre square.");
      }
    } else if (!spansExisting && !placed.some((pos) => touchesTile(board, pos))) {
      return fail("Tiles must connect to a word already on the board.");
    }

    const words: SquareCoordinate[][] = [];
    const main = collectWord(next, placed[0], direction);
    if (main.length >= 2) words.push(main);
    const cross = direction === ACROSS ? DOWN : ACROSS;
    placed.forEach((pos) => {
      const word = collectWord(next, pos, cross);
      if (word.length >= 2) words.push(word);
    });
    if (!words.length) {
      return fail("A word must be at least two letters long.");
    }

    const texts = words.map((word) => wordText(next, word));
    const invalid = texts.find((text) => !this.dictionary.has(text));
    if (invalid) {
      return fail(`"${invalid}" is not a valid word.`);
    }

    const placedKeys = new Set(placed.map(squareIndex));
    const score =
      words.reduce((total, word) => total + scoreWord(next, word, placedKeys), 0) +
      (placed.length === RACK_SIZE ? BINGO_BONUS : 0);
    return { success: true, board: next, score, words: texts };
  }
}

function fail(error: string): PlacementResult {
  return { success: false, error };
}

function inBounds({ row, col }: SquareCoordinate): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    col >= 0 &&
    row < BOARD_SIZE &&
    col < BOARD_SIZE
  );
}

function squareIndex({ row, col }: SquareCoordinate): number {
  return row * BOARD_SIZE + col;
}

function cloneBoard(board: Board): Board {
  return board.map((row) => row.map((square) => ({ ...square })));
}

function squareAt(board: Board, row: number, col: number): BoardSquare | undefined {
  return board[row]?.[col];
}

function touchesTile(board: Board, { row, col }: SquareCoordinate): boolean {
  return NEIGHBOURS.some(([dr, dc]) => Boolean(squareAt(board, row + dr, col + dc)?.tile));
}

function collectWord(board: Board, origin: SquareCoordinate, { dr, dc }: Direction): SquareCoordinate[] {
  let row = origin.row;
  let col = origin.col;
  while (squareAt(board, row - dr, col - dc)?.tile) {
    row -= dr;
    col -= dc;
  }
  const squares: SquareCoordinate[] = [];
  while (squareAt(board, row, col)?.tile) {
    squares.push({ row, col });
    row += dr;
    col += dc;
  }
  return squares;
}

function wordText(board: Board, squares: SquareCoordinate[]): string {
  return squares.map(({ row, col }) => board[row][col].tile?.letter ?? "").join("");
}

function scoreWord(board: Board, squares: SquareCoordinate[], placed: Set<number>): number {
  let letters = 0;
  let wordMultiplier = 1;
  squares.forEach((pos) => {
    const square = board[pos.row][pos.col];
    const tile = square.tile;
    if (!tile) return;
    const base = tile.blank ? 0 : LETTER_VALUES[tile.letter] ?? 0;
    if (!placed.has(squareIndex(pos))) {
      letters += base;
      return;
    }
    switch (square.premium) {
      case "doubleLetter":
        letters += base * 2;
        break;
      case "tripleLetter":
        letters += base * 3;
        break;
      case "doubleWord":
        letters += base;
        wordMultiplier *= 2;
        break;
      case "tripleWord":
        letters += base;
        wordMultiplier *= 3;
        break;
      default:
        letters += base;
    }
  });
  return letters * wordMultiplier;
}

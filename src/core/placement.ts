import { Board, UNPLACED } from '../types';

/**
 * Check if a queen at (row, col) is attacked by any queen in rows 0..row-1.
 * Entries at or beyond row are ignored.
 */
export function isSafe(board: Board, row: number, col: number, n: number): boolean {
  if (col < 0 || col >= n) {
    return false;
  }
  for (let i = 0; i < row; i++) {
    const placed = board[i];
    // Same column
    if (placed === col) {
      return false;
    }
    // Same diagonal, either direction
    if (Math.abs(placed - col) === Math.abs(i - row)) {
      return false;
    }
  }
  return true;
}

/**
 * Columns in ascending order where a queen may be placed in the given row
 */
export function getValidPositions(board: Board, row: number, n: number): number[] {
  const valid: number[] = [];
  for (let col = 0; col < n; col++) {
    if (isSafe(board, row, col, n)) {
      valid.push(col);
    }
  }
  return valid;
}

export function createBoard(n: number): Board {
  return Array(n).fill(UNPLACED);
}

/**
 * Reject board sizes the searches cannot work with
 */
export function assertBoardSize(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`Board size must be a non-negative integer, got ${n}`);
  }
}

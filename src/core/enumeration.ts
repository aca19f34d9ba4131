import { performance } from 'perf_hooks';
import { Board, ExactResult, UNPLACED } from '../types';
import { assertBoardSize, createBoard, isSafe } from './placement';

export class BacktrackingCounter {
  private boardSize: number;
  private progressCallback?: (nodesExplored: number, solutionsFound: number) => void;
  private reportInterval: number = 1000; // Report every second
  private lastReportTime: number = 0;
  private nodesExplored: number = 0;
  private solutionsFound: number = 0;
  private placementChecks: number = 0;

  constructor(boardSize: number, progressCallback?: (nodesExplored: number, solutionsFound: number) => void) {
    assertBoardSize(boardSize);
    this.boardSize = boardSize;
    this.progressCallback = progressCallback;
  }

  /**
   * Run the full search and count every node it visits.
   * A 0x0 board is a single leaf: one node, one (empty) solution.
   */
  count(): ExactResult {
    this.nodesExplored = 0;
    this.solutionsFound = 0;
    this.placementChecks = 0;
    this.lastReportTime = Date.now();

    const board = createBoard(this.boardSize);
    const startTime = performance.now();
    this.backtrack(board, 0);
    const elapsedTime = performance.now() - startTime;

    return {
      nodeCount: this.nodesExplored,
      solutionCount: this.solutionsFound,
      placementChecks: this.placementChecks,
      elapsedTime,
    };
  }

  private backtrack(board: Board, row: number): void {
    this.nodesExplored++;
    if (this.progressCallback && this.nodesExplored % 100000 === 0) {
      const now = Date.now();
      if (now - this.lastReportTime >= this.reportInterval) {
        this.progressCallback(this.nodesExplored, this.solutionsFound);
        this.lastReportTime = now;
      }
    }

    // Base case: every row holds a queen
    if (row === this.boardSize) {
      this.solutionsFound++;
      return;
    }

    for (let col = 0; col < this.boardSize; col++) {
      this.placementChecks++;
      if (isSafe(board, row, col, this.boardSize)) {
        board[row] = col;
        this.backtrack(board, row + 1);
        board[row] = UNPLACED;
      }
    }
  }
}

export function countNodes(n: number): ExactResult {
  return new BacktrackingCounter(n).count();
}

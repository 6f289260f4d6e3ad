export type SurfaceOperation =
  | "beginPath"
  | "addRectangle"
  | "setStrokeStyle"
  | "setLineWidth"
  | "clearRect"
  | "stroke";

/**
 * A live 2D drawing context. Every call may suspend and may fail on its own;
 * failures reject with {@link SurfaceOperationError}.
 *
 * Stroke style and line width persist until set again. `stroke()` consumes
 * the current path, so the next rectangle needs a fresh `beginPath()`.
 */
export interface SurfaceHandle {
  beginPath(): Promise<void>;
  addRectangle(x: number, y: number, width: number, height: number): Promise<void>;
  setStrokeStyle(color: string): Promise<void>;
  setLineWidth(width: number): Promise<void>;
  clearRect(x: number, y: number, width: number, height: number): Promise<void>;
  stroke(): Promise<void>;
}

export class SurfaceOperationError extends Error {
  readonly operation: SurfaceOperation;

  constructor(operation: SurfaceOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Surface operation "${operation}" failed: ${reason}`, { cause });
    this.name = "SurfaceOperationError";
    this.operation = operation;
  }
}

/** Runs one drawing call and reports a throw as a failure of `operation`. */
export async function runSurfaceOperation(operation: SurfaceOperation, draw: () => void): Promise<void> {
  try {
    draw();
  } catch (e) {
    throw new SurfaceOperationError(operation, e);
  }
}

import type { CanvasDimensions } from "../model/types";
import { isValidDimension } from "../model/geometry";
import { CanvasSurfaceHandle, type Canvas2DContext } from "../surface/CanvasSurfaceHandle";
import type { SurfaceHandle } from "../surface/SurfaceHandle";
import { createLogger, type Logger } from "@/lib/logger";

export type RenderStage = "source" | "page" | "viewport" | "context" | "render";

export class PageRenderError extends Error {
  readonly stage: RenderStage;

  constructor(stage: RenderStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Page render failed at ${stage}: ${reason}`, { cause });
    this.name = "PageRenderError";
    this.stage = stage;
  }
}

export type PageSize = {
  width: number;
  height: number;
};

// Structural slices of pdf.js' PDFDocumentProxy / PDFPageProxy.
export interface RenderablePage {
  getViewport(params: { scale: number }): PageSize;
  render(params: {
    canvasContext: Canvas2DContext;
    viewport: PageSize;
    transform?: number[];
  }): { promise: Promise<unknown>; cancel(): void };
}

export interface RenderableDocument {
  readonly numPages: number;
  getPage(pageNumber: number): Promise<RenderablePage>;
  destroy(): Promise<void>;
}

/** Loaders should give up (and free what they started) once `signal` aborts. */
export type DocumentLoader = (source: string, signal?: AbortSignal) => Promise<RenderableDocument>;

export type RenderTarget = {
  width: number;
  height: number;
  getContext(contextId: "2d"): Canvas2DContext | null;
};

export type RenderPageParams = {
  source: string;
  pageNumber: number;
  scale: number;
  canvas: RenderTarget;
  loader: DocumentLoader;
  /** Defaults to identity; pass a device-pixel-ratio scale for HiDPI output. */
  transform?: number[];
  /** Checked before every stage; cancels an in-flight raster render. */
  signal?: AbortSignal;
  logger?: Logger;
};

export type PageRenderResult = {
  dimensions: CanvasDimensions;
  surface: SurfaceHandle;
  pageCount: number;
  /** Still open; the caller releases it with {@link releaseDocument}. */
  document: RenderableDocument;
};

export const IDENTITY_TRANSFORM: readonly number[] = [1, 0, 0, 1, 0, 0];

async function stage<T>(
  name: RenderStage,
  logger: Logger,
  signal: AbortSignal | undefined,
  work: () => T | Promise<T>
): Promise<T> {
  logger.info(`Entering ${name} stage`);
  try {
    if (signal?.aborted) throw new Error("render was aborted");
    return await work();
  } catch (e) {
    logger.error(`Failed at ${name} stage`, e);
    throw new PageRenderError(name, e);
  }
}

/** Destroys a loaded document. Never rejects; a failure is logged. */
export async function releaseDocument(document: RenderableDocument, logger: Logger = createLogger("PageRenderer")) {
  try {
    await document.destroy();
  } catch (e) {
    logger.warn("Failed to release document", e);
  }
}

/**
 * Rasterizes one page onto `canvas`. The canvas is resized to the page
 * viewport before drawing. Rejects with {@link PageRenderError} naming the
 * stage that failed; nothing is retried. The document is released on any
 * failure after it loaded, including an abort that landed while it was loading.
 */
export async function renderPage(params: RenderPageParams): Promise<PageRenderResult> {
  const { source, pageNumber, scale, canvas, loader, signal } = params;
  const logger = params.logger ?? createLogger("PageRenderer");
  const transform = [...(params.transform ?? IDENTITY_TRANSFORM)];

  const pdf = await stage("source", logger, signal, () => loader(source, signal));
  try {
    const page = await stage("page", logger, signal, () => pdf.getPage(pageNumber));
    const viewport = await stage("viewport", logger, signal, () => {
      const vp = page.getViewport({ scale });
      if (!isValidDimension(vp.width) || !isValidDimension(vp.height)) {
        throw new Error(`invalid viewport size ${vp.width}x${vp.height}`);
      }
      return vp;
    });
    const dimensions: CanvasDimensions = { width: viewport.width, height: viewport.height };

    const ctx = await stage("context", logger, signal, () => {
      canvas.width = Math.floor(viewport.width);
      canvas.height = Math.floor(viewport.height);
      const c = canvas.getContext("2d");
      if (!c) throw new Error("2d context is unavailable");
      return c;
    });

    await stage("render", logger, signal, async () => {
      const task = page.render({ canvasContext: ctx, viewport, transform });
      const cancel = () => task.cancel();
      signal?.addEventListener("abort", cancel, { once: true });
      try {
        await task.promise;
      } finally {
        signal?.removeEventListener("abort", cancel);
      }
    });
    logger.info(`Rendered page ${pageNumber}`, dimensions);

    return { dimensions, surface: new CanvasSurfaceHandle(ctx), pageCount: pdf.numPages, document: pdf };
  } catch (e) {
    await releaseDocument(pdf, logger);
    throw e;
  }
}

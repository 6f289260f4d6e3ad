import React, { useCallback, useEffect, useRef, useState } from "react";
import Konva from "konva";
import { LoaderCircle, Square, TriangleAlert } from "lucide-react";
import {
  AnnotationOverlay,
  getSurfaceOffset,
  isPrimaryButton,
  KonvaSurfaceHandle,
  PageRenderError,
  releaseDocument,
  renderPage,
  type OverlayState,
  type RenderableDocument,
  type RenderStage,
} from "@/pdfjs-viewer/main";
import { loadPdfDocument } from "@/pdfjs-viewer/core/render/pdfjsDocumentLoader";
import { createLogger } from "@/lib/logger";
import { appConfig } from "@/config";

if (typeof window !== "undefined") {
  Konva.pixelRatio = Math.max(1, window.devicePixelRatio || 1);
}

const PDF_PAGE_ANNOTATOR_CSS = `
.pdf-annotator{display:flex;flex-direction:column;gap:8px;padding:16px;background:#374151;min-height:100%}
.pdf-annotator-status{display:inline-flex;align-items:center;gap:6px;height:28px;padding:0 10px;border-radius:8px;background:#111827;color:#f9fafb;font-size:13px;align-self:flex-start}
.pdf-annotator-status.error{background:#7f1d1d}
.pdf-annotator-status .spin{animation:pdf-annotator-spin 1s linear infinite}
@keyframes pdf-annotator-spin{to{transform:rotate(360deg)}}
.pdf-annotator-page{position:relative;align-self:center;background:#fff;box-shadow:0 10px 30px rgba(0,0,0,.35)}
.pdf-annotator-page canvas{display:block}
.pdf-annotator-overlay{position:absolute;inset:0;cursor:crosshair}
`;

const STAGE_LABELS: Record<RenderStage, string> = {
  source: "loading the document",
  page: "loading the page",
  viewport: "computing the viewport",
  context: "acquiring the drawing context",
  render: "rendering the page",
};

type RenderStatus =
  | { kind: "loading" }
  | { kind: "ready" }
  | { kind: "error"; stage: RenderStage | null; message: string };

export type PdfPageAnnotatorProps = {
  source: string;
  pageNumber?: number;
  scale?: number;
  /** Called once the document is open, with its total page count. */
  onPageCount?: (pageCount: number) => void;
};

export default function PdfPageAnnotator({
  source,
  pageNumber = 1,
  scale = appConfig.renderScale,
  onPageCount,
}: PdfPageAnnotatorProps) {
  const baseCanvasRef = useRef<HTMLCanvasElement | null>(null);
  const overlayHostRef = useRef<HTMLDivElement | null>(null);
  const overlayRef = useRef<AnnotationOverlay | null>(null);
  const onPageCountRef = useRef(onPageCount);
  onPageCountRef.current = onPageCount;
  const [status, setStatus] = useState<RenderStatus>({ kind: "loading" });
  const [dragState, setDragState] = useState<OverlayState>("idle");

  // 첫 페인트 이후: overlay 준비 → 페이지 렌더 → 크기 전달
  useEffect(() => {
    const canvas = baseCanvasRef.current;
    const host = overlayHostRef.current;
    if (!canvas || !host) return;

    const logger = createLogger("PdfPageAnnotator", appConfig.logLevel);
    const overlay = new AnnotationOverlay({
      logger: createLogger("AnnotationOverlay", appConfig.logLevel),
      strokeStyle: appConfig.overlay.strokeStyle,
      lineWidth: appConfig.overlay.lineWidth,
    });
    overlayRef.current = overlay;
    const offState = overlay.on("stateChanged", setDragState);

    let stage: Konva.Stage | null = null;
    try {
      stage = new Konva.Stage({ container: host, width: 1, height: 1 });
      const layer = new Konva.Layer({ listening: false });
      stage.add(layer);
      overlay.attachSurface(new KonvaSurfaceHandle(layer));
    } catch (e) {
      logger.error("Failed to create overlay stage", e);
      overlay.attachSurface(null);
    }

    let cancelled = false;
    let loadedDocument: RenderableDocument | null = null;
    const abort = new AbortController();
    setStatus({ kind: "loading" });
    const load = async () => {
      try {
        const result = await renderPage({
          source,
          pageNumber,
          scale,
          canvas,
          loader: loadPdfDocument,
          signal: abort.signal,
          logger: createLogger("PageRenderer", appConfig.logLevel),
        });
        if (cancelled) {
          await releaseDocument(result.document, logger);
          return;
        }
        loadedDocument = result.document;
        onPageCountRef.current?.(result.pageCount);
        stage?.size({ width: result.dimensions.width, height: result.dimensions.height });
        overlay.setCanvasDimensions(result.dimensions);
        setStatus({ kind: "ready" });
      } catch (e) {
        if (cancelled) return;
        logger.error("Failed to render page", e);
        setStatus({
          kind: "error",
          stage: e instanceof PageRenderError ? e.stage : null,
          message: e instanceof Error ? e.message : String(e),
        });
      }
    };
    void load();

    return () => {
      cancelled = true;
      abort.abort();
      offState();
      overlay.destroy();
      overlayRef.current = null;
      stage?.destroy();
      if (loadedDocument) void releaseDocument(loadedDocument, logger);
      setDragState("idle");
    };
  }, [source, pageNumber, scale]);

  const handleMouseDown = useCallback((e: React.MouseEvent<HTMLDivElement>) => {
    if (!isPrimaryButton(e)) return;
    overlayRef.current?.pointerDown(getSurfaceOffset(e, e.currentTarget));
  }, []);

  const handleMouseMove = useCallback((e: React.MouseEvent<HTMLDivElement>) => {
    const overlay = overlayRef.current;
    if (!overlay) return;
    void overlay.pointerMove(getSurfaceOffset(e, e.currentTarget));
  }, []);

  const handleMouseUp = useCallback(() => {
    overlayRef.current?.pointerUp();
  }, []);

  // Releasing the button outside the page never reaches onMouseUp.
  const handleMouseEnter = useCallback((e: React.MouseEvent<HTMLDivElement>) => {
    if ((e.buttons & 1) === 0) overlayRef.current?.pointerUp();
  }, []);

  return (
    <div className="pdf-annotator">
      <style>{PDF_PAGE_ANNOTATOR_CSS}</style>

      {status.kind === "loading" && (
        <div className="pdf-annotator-status" role="status">
          <LoaderCircle size={14} className="spin" aria-hidden />
          Rendering page {pageNumber}...
        </div>
      )}
      {status.kind === "error" && (
        <div className="pdf-annotator-status error" role="alert">
          <TriangleAlert size={14} aria-hidden />
          {status.stage ? `Failed while ${STAGE_LABELS[status.stage]}` : status.message}
        </div>
      )}
      {status.kind === "ready" && (
        <div className="pdf-annotator-status" role="status">
          <Square size={14} aria-hidden />
          {dragState === "dragging" ? "Drawing" : `Page ${pageNumber}`}
        </div>
      )}

      <div className="pdf-annotator-page">
        <canvas ref={baseCanvasRef} data-testid="pdf-base-canvas" />
        <div
          ref={overlayHostRef}
          className="pdf-annotator-overlay"
          data-testid="pdf-overlay"
          onMouseDown={handleMouseDown}
          onMouseMove={handleMouseMove}
          onMouseUp={handleMouseUp}
          onMouseEnter={handleMouseEnter}
        />
      </div>
    </div>
  );
}

export type { OverlayState } from "./core/model/types";
export { AnnotationOverlay } from "./core/engine/AnnotationOverlay";
export { KonvaSurfaceHandle } from "./core/surface/KonvaSurfaceHandle";
export { PageRenderError, releaseDocument, renderPage } from "./core/render/PageRenderer";
export type { RenderableDocument, RenderStage } from "./core/render/PageRenderer";
export { getSurfaceOffset, isPrimaryButton } from "./core/input/pointer";

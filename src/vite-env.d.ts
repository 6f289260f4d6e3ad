/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_PDF_SOURCE?: string;
  readonly VITE_PDF_PAGE?: string;
  readonly VITE_PDF_SCALE?: string;
  readonly VITE_PDF_WORKER_SRC?: string;
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_OVERLAY_STROKE?: string;
  readonly VITE_OVERLAY_LINE_WIDTH?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}

import * as pdfjsLib from "pdfjs-dist";
import type { DocumentLoader } from "./PageRenderer";
import { createLogger } from "@/lib/logger";
import { appConfig } from "@/config";

// Worker 설정
if (typeof window !== "undefined") {
  pdfjsLib.GlobalWorkerOptions.workerSrc = appConfig.workerSrc;
}

const logger = createLogger("pdfjsDocumentLoader", appConfig.logLevel);

export const loadPdfDocument: DocumentLoader = async (source, signal) => {
  const task = pdfjsLib.getDocument(source);
  // An abort tears the loading task down, which also rejects task.promise.
  const cancel = () => {
    task.destroy().catch((e: unknown) => logger.warn("Failed to destroy loading task", e));
  };
  if (signal?.aborted) cancel();
  else signal?.addEventListener("abort", cancel, { once: true });
  try {
    return await task.promise;
  } finally {
    signal?.removeEventListener("abort", cancel);
  }
};

import { afterEach, describe, expect, it, vi } from "vitest";
import { loadPdfDocument } from "./pdfjsDocumentLoader";

const pdfjs = vi.hoisted(() => {
  const task = {
    settle: (_doc: unknown) => {},
    fail: (_reason: unknown) => {},
    promise: Promise.resolve<unknown>(null),
    destroy: async () => {},
  };
  const reset = () => {
    task.promise = new Promise((resolve, reject) => {
      task.settle = resolve;
      task.fail = reject;
    });
  };
  return { task, reset };
});

vi.mock("pdfjs-dist", () => ({
  GlobalWorkerOptions: { workerSrc: "" },
  getDocument: vi.fn(() => pdfjs.task),
}));

describe("loadPdfDocument", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves the loaded document", async () => {
    pdfjs.reset();
    const doc = { numPages: 3, getPage: vi.fn(), destroy: vi.fn(async () => {}) };
    const p = loadPdfDocument("/documents/test.pdf");
    pdfjs.task.settle(doc);
    await expect(p).resolves.toBe(doc);
  });

  it("destroys the loading task when the signal aborts", async () => {
    pdfjs.reset();
    const destroy = vi.spyOn(pdfjs.task, "destroy").mockImplementation(async () => {
      pdfjs.task.fail(new Error("Worker was destroyed"));
    });
    const controller = new AbortController();

    const p = loadPdfDocument("/documents/test.pdf", controller.signal);
    controller.abort();

    await expect(p).rejects.toThrow("Worker was destroyed");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("destroys the loading task at once when already aborted", async () => {
    pdfjs.reset();
    const destroy = vi.spyOn(pdfjs.task, "destroy").mockImplementation(async () => {
      pdfjs.task.fail(new Error("Worker was destroyed"));
    });
    const controller = new AbortController();
    controller.abort();

    await expect(loadPdfDocument("/documents/test.pdf", controller.signal)).rejects.toThrow("Worker was destroyed");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it("leaves the loading task alone when nothing aborts", async () => {
    pdfjs.reset();
    const destroy = vi.spyOn(pdfjs.task, "destroy");
    const controller = new AbortController();
    const p = loadPdfDocument("/documents/test.pdf", controller.signal);
    pdfjs.task.settle({ numPages: 1 });
    await p;
    controller.abort();
    expect(destroy).not.toHaveBeenCalled();
  });
});

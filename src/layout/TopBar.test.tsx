import { afterEach, describe, expect, it } from "vitest";
import { cleanup, render, screen } from "@testing-library/react";
import { MemoryRouter, Route, Routes } from "react-router-dom";
import TopBar from "./TopBar";

function renderAt(path: string, pageCount: number | null) {
  return render(
    <MemoryRouter initialEntries={[path]}>
      <Routes>
        <Route path="/pages/:pageNumber" element={<TopBar pageCount={pageCount} />} />
      </Routes>
    </MemoryRouter>
  );
}

describe("TopBar", () => {
  afterEach(() => {
    cleanup();
  });

  it("disables the next link on the last page", () => {
    renderAt("/pages/3", 3);
    expect(screen.getByText("Page 3 of 3")).toBeTruthy();
    expect(screen.getByTitle("Next page").getAttribute("aria-disabled")).toBe("true");
    expect(screen.getByTitle("Previous page").getAttribute("aria-disabled")).toBe("false");
  });

  it("links forward and back from a middle page", () => {
    renderAt("/pages/2", 3);
    expect(screen.getByTitle("Next page").getAttribute("href")).toBe("/pages/3");
    expect(screen.getByTitle("Next page").getAttribute("aria-disabled")).toBe("false");
    expect(screen.getByTitle("Previous page").getAttribute("href")).toBe("/pages/1");
  });

  it("disables the previous link on the first page", () => {
    renderAt("/pages/1", 3);
    expect(screen.getByTitle("Previous page").getAttribute("aria-disabled")).toBe("true");
  });

  it("keeps the next link open while the page count is unknown", () => {
    renderAt("/pages/7", null);
    expect(screen.getByText("Page 7")).toBeTruthy();
    expect(screen.getByTitle("Next page").getAttribute("aria-disabled")).toBe("false");
  });
});

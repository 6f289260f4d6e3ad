import { createContext, useContext, useState } from "react";
import { Outlet } from "react-router-dom";
import TopBar from "./TopBar";

const APP_LAYOUT_CSS = `
.app-shell{display:flex;flex-direction:column;min-height:100vh;font-family:system-ui,-apple-system,Segoe UI,Roboto,sans-serif}
.app-shell .main{flex:1 1 auto;min-height:0}
`;

type PageCountSetter = (pageCount: number) => void;

const PageCountContext = createContext<PageCountSetter>(() => {});

/** Lets a routed page report the open document's page count to the top bar. */
export function useReportPageCount(): PageCountSetter {
  return useContext(PageCountContext);
}

export default function AppLayout() {
  // null until a document has loaded
  const [pageCount, setPageCount] = useState<number | null>(null);

  return (
    <div className="app-shell">
      <style>{APP_LAYOUT_CSS}</style>
      <TopBar pageCount={pageCount} />
      <main className="main">
        <PageCountContext.Provider value={setPageCount}>
          <Outlet />
        </PageCountContext.Provider>
      </main>
    </div>
  );
}

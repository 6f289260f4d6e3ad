import { Link, useParams } from "react-router-dom";
import { ChevronLeft, ChevronRight } from "lucide-react";
import { appConfig } from "@/config";
import { parsePageNumber } from "@/router/pageParams";

const TOP_BAR_CSS = `
.topbar{position:sticky;top:0;z-index:50;display:flex;align-items:center;gap:12px;padding:8px 12px;background:#111827;color:#f9fafb;border-bottom:1px solid rgba(255,255,255,.08)}
.topbar .grow{flex:1 1 auto}
.topbar .title{font-weight:600;font-size:14px}
.topbar .nav{display:inline-flex;align-items:center;gap:6px;font-size:13px}
.topbar .btn{display:inline-flex;align-items:center;justify-content:center;height:30px;min-width:30px;border-radius:8px;border:1px solid rgba(255,255,255,.18);color:inherit;text-decoration:none}
.topbar .btn[aria-disabled="true"]{opacity:.5;pointer-events:none}
`;

export type TopBarProps = {
  pageCount: number | null;
};

export default function TopBar({ pageCount }: TopBarProps) {
  const { pageNumber } = useParams<{ pageNumber: string }>();
  const page = parsePageNumber(pageNumber, appConfig.pageNumber);
  const isLastPage = pageCount !== null && page >= pageCount;

  return (
    <header className="topbar">
      <style>{TOP_BAR_CSS}</style>
      <div className="title">{appConfig.documentSource}</div>
      <div className="grow" />
      <nav className="nav" aria-label="Page navigation">
        <Link className="btn" to={`/pages/${page - 1}`} aria-disabled={page <= 1} title="Previous page">
          <ChevronLeft size={16} aria-hidden />
        </Link>
        <span>{pageCount === null ? `Page ${page}` : `Page ${page} of ${pageCount}`}</span>
        <Link className="btn" to={`/pages/${page + 1}`} aria-disabled={isLastPage} title="Next page">
          <ChevronRight size={16} aria-hidden />
        </Link>
      </nav>
    </header>
  );
}

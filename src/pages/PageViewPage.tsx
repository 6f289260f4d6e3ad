import { useParams } from "react-router-dom";
import PdfPageAnnotator from "@/components/PdfPageAnnotator";
import { appConfig } from "@/config";
import { parsePageNumber } from "@/router/pageParams";
import { useReportPageCount } from "@/layout/AppLayout";

export default function PageViewPage() {
  const { pageNumber } = useParams<{ pageNumber: string }>();
  const page = parsePageNumber(pageNumber, appConfig.pageNumber);
  const reportPageCount = useReportPageCount();

  return (
    <PdfPageAnnotator
      // remount per page so the overlay and its one-time handshake start fresh
      key={`${appConfig.documentSource}#${page}`}
      source={appConfig.documentSource}
      pageNumber={page}
      scale={appConfig.renderScale}
      onPageCount={reportPageCount}
    />
  );
}

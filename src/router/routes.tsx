import type { RouteObject } from "react-router-dom";
import { Link, Navigate } from "react-router-dom";

import AppLayout from "@/layout/AppLayout";
import PageViewPage from "@/pages/PageViewPage";
import { appConfig } from "@/config";

/**
 * RouteModule: self-contained unit that can be registered under a base path.
 */
export type RouteModule = {
  base: string;
  routes: RouteObject[];
  label?: string;
};

export const pageViewModule: RouteModule = {
  base: "/pages",
  label: "Page",
  routes: [
    { index: true, element: <Navigate to={`/pages/${appConfig.pageNumber}`} replace /> },
    { path: ":pageNumber", element: <PageViewPage /> },
  ],
};

export const ROUTE_MODULES: RouteModule[] = [pageViewModule];

const NotFoundPage = () => (
  <div style={{ padding: 24 }}>
    <h1 style={{ fontSize: 20, fontWeight: 600 }}>404</h1>
    <p>Page not found.</p>
    <Link to="/">Go to the document</Link>
  </div>
);

export function buildRoutes(): RouteObject[] {
  return [
    { path: "/404", element: <NotFoundPage /> },
    {
      path: "/",
      element: <AppLayout />,
      children: [
        { index: true, element: <Navigate to={`/pages/${appConfig.pageNumber}`} replace /> },
        ...ROUTE_MODULES.map((m) => ({
          path: m.base,
          children: m.routes,
        })),
        { path: "*", element: <Navigate to="/404" replace /> },
      ],
    },
  ];
}

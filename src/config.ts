import type { LogLevel } from "@/lib/logger";

export type AppConfig = {
  documentSource: string;
  pageNumber: number;
  renderScale: number;
  workerSrc: string;
  logLevel: LogLevel;
  overlay: {
    strokeStyle: string;
    lineWidth: number;
  };
};

export const DEFAULT_CONFIG: AppConfig = {
  documentSource: "/documents/sample.pdf",
  pageNumber: 1,
  renderScale: 1.5,
  workerSrc: "/pdf.worker.min.mjs",
  logLevel: "info",
  overlay: {
    strokeStyle: "black",
    lineWidth: 2,
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

type RawEnv = Record<string, unknown>;

function readString(env: RawEnv, key: string, fallback: string): string {
  const v = env[key];
  if (typeof v !== "string") return fallback;
  const trimmed = v.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function readPositiveNumber(env: RawEnv, key: string, fallback: number): number {
  const v = env[key];
  if (typeof v !== "string" || v.trim() === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function readPositiveInteger(env: RawEnv, key: string, fallback: number): number {
  const n = readPositiveNumber(env, key, fallback);
  return Number.isInteger(n) ? n : fallback;
}

function isLogLevel(v: string): v is LogLevel {
  return LOG_LEVELS.some((level) => level === v);
}

function readLogLevel(env: RawEnv, key: string, fallback: LogLevel): LogLevel {
  const v = readString(env, key, fallback).toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

// Unset or malformed values fall back to DEFAULT_CONFIG.
export function readConfig(env: RawEnv): AppConfig {
  return {
    documentSource: readString(env, "VITE_PDF_SOURCE", DEFAULT_CONFIG.documentSource),
    pageNumber: readPositiveInteger(env, "VITE_PDF_PAGE", DEFAULT_CONFIG.pageNumber),
    renderScale: readPositiveNumber(env, "VITE_PDF_SCALE", DEFAULT_CONFIG.renderScale),
    workerSrc: readString(env, "VITE_PDF_WORKER_SRC", DEFAULT_CONFIG.workerSrc),
    logLevel: readLogLevel(env, "VITE_LOG_LEVEL", DEFAULT_CONFIG.logLevel),
    overlay: {
      strokeStyle: readString(env, "VITE_OVERLAY_STROKE", DEFAULT_CONFIG.overlay.strokeStyle),
      lineWidth: readPositiveNumber(env, "VITE_OVERLAY_LINE_WIDTH", DEFAULT_CONFIG.overlay.lineWidth),
    },
  };
}

export const appConfig: AppConfig = readConfig(import.meta.env);

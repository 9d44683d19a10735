import type { LayoutErrorCode, LayoutFatal } from "../../errors.js";

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the layout system to propagate failures upward.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fatal(code: LayoutErrorCode, detail: string, path?: string): LayoutResult<never> {
  return {
    ok: false,
    fatal: path === undefined ? { code, detail } : { code, detail, path },
  };
}

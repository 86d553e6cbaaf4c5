/**
 * Dev-mode warnings about geometry.
 *
 * Each distinct issue is reported once per widget.
 */

export type TextWarningContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  warn: (message: string) => void;
}>;

export function warnTextIssue(ctx: TextWarningContext, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warned.has(key)) return;
  ctx.warned.add(key);
  ctx.warn(`[gridtext][text] ${detail}`);
}

export function describeCanvasSize(cols: number, rows: number): string {
  return `${String(cols)}x${String(rows)}`;
}

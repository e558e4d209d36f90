import type { PageViews, ViewsWindow } from "@/types/telegraph";
import { expectRecord, requireNumber } from "./fields";

/**
 * The API only returns `{ views }`; the requested window is echoed back onto the result
 */
export function mapPageViews(json: unknown, window: ViewsWindow = {}): PageViews {
  const source = expectRecord(json, "");
  const views: PageViews = { views: requireNumber(source, "views") };

  if (window.year !== undefined) views.year = window.year;
  if (window.month !== undefined) views.month = window.month;
  if (window.day !== undefined) views.day = window.day;
  if (window.hour !== undefined) views.hour = window.hour;

  return Object.freeze(views);
}

import { Listing } from "./dto";
import { errorMessage } from "./utils";

export type AlertKind = "session" | "run";

const alertTitles: Record<AlertKind, string> = {
  session: "租屋監控故障：無法建立連線",
  run: "租屋監控執行錯誤",
};

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function formatPrice(price: Listing["price"]): string {
  return typeof price === "number" ? price.toLocaleString("en-US") : price;
}

/**
 * One listing as a Telegram HTML message. Empty fields are left out.
 */
export function formatListing(listing: Listing): string {
  const lines: string[] = [];
  const price = formatPrice(listing.price);

  if (listing.title) lines.push(`🏠 <b>${escapeHtml(listing.title)}</b>`);
  if (price) lines.push(`💰 ${escapeHtml(price)} 元/月`);
  if (listing.address) lines.push(`📍 ${escapeHtml(listing.address)}`);
  if (listing.areaText) lines.push(`📐 ${escapeHtml(listing.areaText)}`);
  if (listing.floorText) {
    const elevator = listing.hasElevator ? "有電梯" : "無電梯";
    lines.push(`🏢 ${escapeHtml(listing.floorText)}（${elevator}）`);
  }
  if (listing.roomLabel) lines.push(`🛏 ${escapeHtml(listing.roomLabel)}`);
  if (listing.url) lines.push(`🔗 <a href="${escapeHtml(listing.url)}">查看詳情</a>`);

  return lines.join("\n");
}

export function formatAlert(kind: AlertKind, error: unknown): string {
  return `🚨 ${alertTitles[kind]}\n${escapeHtml(errorMessage(error))}`;
}

import type { ControlPlaneEvent, GatewayEvent } from "@gatewire/core";

function truncateText(value: string, max = 220): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, Math.max(0, max - 3))}...`;
}

export function summarizeValue(value: unknown): string {
  if (typeof value === "string") {
    return truncateText(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  try {
    return truncateText(JSON.stringify(value));
  } catch {
    return truncateText(String(value));
  }
}

export function formatGatewayEvent(attempt: number, event: GatewayEvent): string {
  const summary = event.payload === undefined ? "" : ` ${summarizeValue(event.payload)}`;
  return `[gatewire][event] ${attempt} ${event.name}${summary}`;
}

export function formatControlPlaneEvent(event: ControlPlaneEvent): string {
  const keys = Object.keys(event.payload).sort((left, right) => left.localeCompare(right));
  const payloadSummary = keys.map((key) => `${key}=${summarizeValue(event.payload[key])}`).join(" ");
  return `[gatewire][control] ${event.timestamp} ${event.type}${payloadSummary ? ` ${payloadSummary}` : ""}`;
}

import { MAX_SENDER_NAME_LENGTH } from "@syncboard/protocol";

// Display names are optional; blank ones are treated as absent.
export function normalizeSenderName(name: string | null | undefined): string | undefined {
  const trimmed = (name ?? "").trim().slice(0, MAX_SENDER_NAME_LENGTH).trim();
  return trimmed || undefined;
}

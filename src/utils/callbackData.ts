// src/utils/callbackData.ts
import { MalformedRequestError } from "../errors";

/**
 * Inline button payloads:
 *   view:<eventId>
 *   delete:<eventId>
 *   rsvp:<eventId>:<status>
 * The status is kept raw here; the rsvp handler rejects unknown values itself.
 */
export type CallbackAction =
  | { kind: "view"; eventId: number }
  | { kind: "delete"; eventId: number }
  | { kind: "rsvp"; eventId: number; status: string };

export const CB = {
  VIEW_PREFIX: "view:",
  DELETE_PREFIX: "delete:",
  RSVP_PREFIX: "rsvp:",
} as const;

export function parseEventId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** null for payloads this bot does not own; throws MalformedRequestError for broken ones it does. */
export function parseCallbackData(data: string): CallbackAction | null {
  const parts = data.split(":");
  const kind = parts[0];

  if (kind !== "view" && kind !== "delete" && kind !== "rsvp") return null;

  const arity = kind === "rsvp" ? 3 : 2;
  const eventId = parseEventId(parts[1]);
  if (parts.length !== arity || eventId === null) {
    throw new MalformedRequestError(`Invalid ${kind} data`, data);
  }

  if (kind === "rsvp") return { kind, eventId, status: parts[2] ?? "" };
  return { kind, eventId };
}

export function viewData(eventId: number) {
  return `${CB.VIEW_PREFIX}${eventId}`;
}

export function deleteData(eventId: number) {
  return `${CB.DELETE_PREFIX}${eventId}`;
}

export function rsvpData(eventId: number, status: string) {
  return `${CB.RSVP_PREFIX}${eventId}:${status}`;
}

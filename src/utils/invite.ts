// src/utils/invite.ts
import { MalformedRequestError } from "../errors";
import { parseEventId } from "./callbackData";

export const JOIN_PREFIX = "join_";

export type InviteOptions = {
  host: string; // e.g. "t.me"
  botUsername: string;
};

export function buildInviteLink(eventId: number, opts: InviteOptions): string {
  return `https://${opts.host}/${opts.botUsername}?start=${JOIN_PREFIX}${eventId}`;
}

export function isJoinPayload(payload: string): boolean {
  return payload.startsWith(JOIN_PREFIX);
}

/**
 * Accepts the /start payload ("join_42") or a full invite link.
 */
export function extractEventId(payloadOrLink: string): number {
  let payload = payloadOrLink.trim();

  if (/^https?:\/\//.test(payload)) {
    try {
      payload = new URL(payload).searchParams.get("start") ?? "";
    } catch {
      throw new MalformedRequestError("Invalid invitation link", payloadOrLink);
    }
  }

  if (!isJoinPayload(payload)) {
    throw new MalformedRequestError("Not an invitation payload", payloadOrLink);
  }

  const eventId = parseEventId(payload.slice(JOIN_PREFIX.length));
  if (eventId === null) throw new MalformedRequestError("Invalid invitation link", payloadOrLink);
  return eventId;
}

/**
 * Bot username for invite links, looked up once per process.
 * Concurrent first callers share the same lookup; a failed lookup is retried next time.
 */
export function createBotIdentity(fetchUsername: () => Promise<string>) {
  let cached: string | null = null;
  let pending: Promise<string> | null = null;

  async function username(): Promise<string> {
    if (cached !== null) return cached;
    if (!pending) {
      pending = fetchUsername()
        .then((name) => {
          cached = name;
          return name;
        })
        .finally(() => {
          pending = null;
        });
    }
    return pending;
  }

  return { username };
}

export type BotIdentity = ReturnType<typeof createBotIdentity>;

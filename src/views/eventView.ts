// src/views/eventView.ts
import type { PlannedEvent, RsvpCounts, RsvpStatus } from "../services/eventStore";
import { deleteData, rsvpData, viewData } from "../utils/callbackData";

/** Transport-neutral inline button; the Telegram adapter turns rows into a keyboard. */
export type ActionButton = { text: string; data: string };
export type ActionRows = ActionButton[][];

export type RenderEventOptions = {
  viewerStatus?: RsvpStatus | null;
  counts?: RsvpCounts;
  inviteLink?: string;
  showStatus?: boolean; // default true
};

const RSVP_BUTTONS: ReadonlyArray<{ text: string; status: RsvpStatus }> = [
  { text: "✅ Yes", status: "yes" },
  { text: "❌ No", status: "no" },
  { text: "❔ Maybe", status: "maybe" },
];

export function escapeHtml(text: string | null | undefined): string {
  return (text ?? "").replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function capitalize(s: string) {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}

export function renderCounts(counts: RsvpCounts): string {
  return `RSVPs — Yes: ${counts.yes} | No: ${counts.no} | Maybe: ${counts.maybe}`;
}

export function renderEvent(event: PlannedEvent, opts: RenderEventOptions = {}): string {
  const lines = [
    `📌 <b>${escapeHtml(event.title)}</b>`,
    `Type: ${escapeHtml(event.type)}`,
    `Time: ${escapeHtml(event.time)}`,
    `Location: ${escapeHtml(event.location)}`,
  ];

  if (opts.counts) lines.push(renderCounts(opts.counts));

  if (opts.showStatus ?? true) {
    lines.push(`Your RSVP: ${opts.viewerStatus ? capitalize(opts.viewerStatus) : "Not set"}`);
  }

  if (opts.inviteLink) lines.push(`Invite friends ➜ ${escapeHtml(opts.inviteLink)}`);

  return lines.join("\n");
}

export function renderRsvpActions(eventId: number): ActionRows {
  return [RSVP_BUTTONS.map((b) => ({ text: b.text, data: rsvpData(eventId, b.status) }))];
}

// one line per event in /my
export function renderEventSummary(event: PlannedEvent): string {
  return `<b>${escapeHtml(event.title)}</b> — ${escapeHtml(event.time)} (${escapeHtml(event.type)})`;
}

export function renderManageActions(eventId: number): ActionRows {
  return [
    [{ text: "View", data: viewData(eventId) }],
    [{ text: "Delete", data: deleteData(eventId) }],
  ];
}

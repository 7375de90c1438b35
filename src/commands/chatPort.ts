// src/commands/chatPort.ts
import type { TransportDeliveryError } from "../errors";
import type { ActionRows } from "../views/eventView";

export type Actor = {
  userId: number;
  isPrivate: boolean;
};

export type DeliveryOutcome =
  | { mode: "edited" }
  | { mode: "unchanged" } // gateway said the message already reads like this
  | { mode: "sent"; reason: TransportDeliveryError };

/**
 * What the controller may do in the chat an update came from.
 * Text is HTML.
 */
export interface ChatPort {
  /** New message in the chat. */
  send(text: string, actions?: ActionRows): Promise<void>;
  /** Short answer quoting the triggering message. */
  reply(text: string): Promise<void>;
  /** Acknowledge a button press, optionally with a toast or an alert. */
  answer(text?: string, opts?: { alert?: boolean }): Promise<void>;
  /** Edit the message whose button was pressed; send a new one if the gateway refuses. */
  updateOrSend(text: string, actions?: ActionRows): Promise<DeliveryOutcome>;
}

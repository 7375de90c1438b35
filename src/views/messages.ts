// src/views/messages.ts
import { DEFAULT_TIME_TEXT } from "../flows/newEvent";
import type { EventStep } from "../state/conversationStore";

export const TEXT = {
  GREETING: "Hi! I'm Tomorrow Planner. Use /new to create an event for tomorrow or /help for all commands.",
  HELP:
    "Commands:\n" +
    "/new – create an event for tomorrow\n" +
    "/my – manage events you created\n" +
    "/cancel – stop creating an event\n" +
    "/help – show this help message",

  NEW_PRIVATE_ONLY: "Please start a private chat with me to create events.",
  MY_PRIVATE_ONLY: "Please open a private chat to view your events.",
  JOIN_PRIVATE_ONLY: "Please message me privately to join this event.",

  CANCELLED: "Event creation cancelled. Nothing was saved.",
  NOTHING_TO_CANCEL: "Nothing to cancel.",
  NO_EVENTS: "You haven't created any events yet. Use /new to start.",

  INVALID_INVITE: "Invalid invitation link.",
  EVENT_GONE: "Event not found or already deleted.",
  EVENT_NOT_FOUND: "Event not found.",
  NO_ACCESS: "You do not have access to this event.",
  JOIN_FIRST: "Join via the invite link first.",
  DELETE_NOT_OWNER: "You can only delete your own events.",
  DELETED: "Event deleted.",
  UNKNOWN_OPTION: "Unknown option.",
  INVALID_DATA: "Invalid data.",

  SAVE_FAILED: "Could not save the event. Please try /new again.",
  SAVED_HEADER: "Event saved! Share it with friends.",
  INVITED_HEADER: "You're invited to an event for tomorrow!",
} as const;

export function promptFor(step: EventStep): string {
  switch (step) {
    case "title":
      return "Let's plan tomorrow! What's the event name or short description?\n\nSend /cancel to stop anytime.";
    case "location":
      return "Where will it happen? Send a location pin or type the place.";
    case "type":
      return "What type of event is it? (e.g., dinner, movie, walk)";
    case "time":
      return `What time tomorrow? Use 24-hour format like 19:00. Leave empty for ${DEFAULT_TIME_TEXT}.`;
  }
}

export function rsvpSetNotice(status: string) {
  return `RSVP set to ${status[0].toUpperCase()}${status.slice(1)}.`;
}

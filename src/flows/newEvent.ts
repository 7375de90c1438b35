import { ValidationError } from "../errors";
import type { NewEventInput } from "../services/eventStore";
import { EVENT_STEPS, ConversationState, EventDraft, EventStep } from "../state/conversationStore";

/**
 * /new dialogue: title -> location -> type -> time -> complete
 * Pure transitions; the controller owns the session store and persistence.
 */

export const DEFAULT_TIME_TEXT = "Tomorrow 19:00";

export type DialogueInput =
  | { kind: "text"; text: string }
  | { kind: "location"; latitude: number; longitude: number };

export type StepOutcome =
  | { kind: "invalid"; step: EventStep; error: ValidationError }
  | { kind: "next"; step: EventStep; state: ConversationState }
  | { kind: "complete"; event: NewEventInput };

type StepParse = { ok: true; value: string } | { ok: false; error: string };

export function startConversation(): ConversationState {
  return { stepIndex: 0, fields: {} };
}

export function currentStep(state: ConversationState): EventStep | null {
  return EVENT_STEPS[state.stepIndex] ?? null;
}

export function formatPin(latitude: number, longitude: number): string {
  return `Pin: ${latitude.toFixed(6)}, ${longitude.toFixed(6)}`;
}

/**
 * ""      -> "Tomorrow 19:00"
 * "20:15"   -> "Tomorrow 20:15"
 * other     -> as typed
 */
export function parseTimeText(raw: string): string {
  const text = raw.trim();
  if (!text) return DEFAULT_TIME_TEXT;
  if (/^\d{2}:\d{2}$/.test(text)) return `Tomorrow ${text}`;
  return text;
}

function requireText(input: DialogueInput, error: string): StepParse {
  if (input.kind !== "text") return { ok: false, error };
  const value = input.text.trim();
  return value ? { ok: true, value } : { ok: false, error };
}

function parseStep(step: EventStep, input: DialogueInput): StepParse {
  switch (step) {
    case "title":
      return requireText(input, "Please send a short title or description for the event.");
    case "location":
      if (input.kind === "location") return { ok: true, value: formatPin(input.latitude, input.longitude) };
      return requireText(input, "Send a location pin or type the location.");
    case "type":
      return requireText(input, "Please tell me the event type (e.g., dinner, movie, walk).");
    case "time":
      if (input.kind !== "text") return { ok: false, error: "Please type the time, for example 19:30." };
      return { ok: true, value: parseTimeText(input.text) };
  }
}

function toEventInput(fields: EventDraft): NewEventInput | null {
  const { title, location, type, time } = fields;
  if (title === undefined || location === undefined || type === undefined || time === undefined) return null;
  return { title, location, type, time };
}

export function applyInput(state: ConversationState, input: DialogueInput): StepOutcome {
  const step = currentStep(state);
  if (!step) throw new Error(`Conversation already past its last step (${state.stepIndex})`);

  const parsed = parseStep(step, input);
  if (!parsed.ok) return { kind: "invalid", step, error: new ValidationError(parsed.error, step) };

  const fields: EventDraft = { ...state.fields, [step]: parsed.value };
  const nextState: ConversationState = { stepIndex: state.stepIndex + 1, fields };
  const nextStep = currentStep(nextState);

  if (nextStep) return { kind: "next", step: nextStep, state: nextState };

  const event = toEventInput(fields);
  if (!event) throw new Error("Conversation completed with missing fields");
  return { kind: "complete", event };
}

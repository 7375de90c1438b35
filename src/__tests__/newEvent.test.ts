import { ValidationError } from "../errors";
import {
  DEFAULT_TIME_TEXT,
  DialogueInput,
  StepOutcome,
  applyInput,
  currentStep,
  formatPin,
  parseTimeText,
  startConversation,
} from "../flows/newEvent";

const text = (t: string): DialogueInput => ({ kind: "text", text: t });
const pin = (latitude: number, longitude: number): DialogueInput => ({ kind: "location", latitude, longitude });

// Feeds inputs one by one and returns the last outcome.
function run(inputs: DialogueInput[]): StepOutcome {
  let state = startConversation();
  let outcome: StepOutcome | null = null;
  for (const input of inputs) {
    outcome = applyInput(state, input);
    if (outcome.kind === "next") state = outcome.state;
  }
  if (!outcome) throw new Error("no inputs");
  return outcome;
}

describe("new event dialogue", () => {
  it("starts at the title step with nothing collected", () => {
    const state = startConversation();
    expect(state).toEqual({ stepIndex: 0, fields: {} });
    expect(currentStep(state)).toBe("title");
  });

  it("walks title -> location -> type -> time", () => {
    let state = startConversation();
    const seen: string[] = [];

    for (const input of ["Picnic", "Park", "walk"]) {
      const out = applyInput(state, text(input));
      if (out.kind !== "next") throw new Error(`unexpected ${out.kind}`);
      seen.push(out.step);
      state = out.state;
    }

    expect(seen).toEqual(["location", "type", "time"]);
    expect(state.fields).toEqual({ title: "Picnic", location: "Park", type: "walk" });
  });

  it("completes with trimmed values and the default time", () => {
    const out = run([text("  Board games "), text("Alex's place"), text(" game night"), text("")]);

    expect(out).toEqual({
      kind: "complete",
      event: { title: "Board games", location: "Alex's place", type: "game night", time: "Tomorrow 19:00" },
    });
  });

  it("formats a location pin with six decimals", () => {
    const out = run([text("Run"), pin(55.7558, 37.6173)]);
    if (out.kind !== "next") throw new Error(`unexpected ${out.kind}`);
    expect(out.state.fields.location).toBe("Pin: 55.755800, 37.617300");
  });

  it("re-prompts the same step on blank input without advancing", () => {
    const state = startConversation();
    const out = applyInput(state, text("   "));

    expect(out.kind).toBe("invalid");
    if (out.kind !== "invalid") return;
    expect(out.step).toBe("title");
    expect(out.error).toBeInstanceOf(ValidationError);
    expect(out.error.message).toBe("Please send a short title or description for the event.");
    expect(state).toEqual({ stepIndex: 0, fields: {} });
  });

  it("rejects a pin where text is expected", () => {
    const out = run([text("Dinner"), text("Cafe"), pin(1, 2)]);
    expect(out.kind).toBe("invalid");
    if (out.kind !== "invalid") return;
    expect(out.step).toBe("type");
  });

  it("asks for a typed time when a pin is sent at the time step", () => {
    const out = run([text("Dinner"), text("Cafe"), text("dinner"), pin(1, 2)]);
    expect(out.kind).toBe("invalid");
    if (out.kind !== "invalid") return;
    expect(out.error.message).toBe("Please type the time, for example 19:30.");
  });

  it("refuses input after the last step", () => {
    expect(() => applyInput({ stepIndex: 4, fields: {} }, text("x"))).toThrow();
  });
});

describe("parseTimeText", () => {
  it.each([
    ["", DEFAULT_TIME_TEXT],
    ["   ", "Tomorrow 19:00"],
    ["-", "-"],
    ["20:15", "Tomorrow 20:15"],
    [" 08:30 ", "Tomorrow 08:30"],
    ["whenever", "whenever"],
    ["7:30", "7:30"],
    ["after lunch", "after lunch"],
  ])("%j -> %j", (input, expected) => {
    expect(parseTimeText(input)).toBe(expected);
  });
});

describe("formatPin", () => {
  it("keeps the sign of southern and western coordinates", () => {
    expect(formatPin(-33.8688, -151.2093)).toBe("Pin: -33.868800, -151.209300");
  });
});

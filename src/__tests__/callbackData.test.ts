import { MalformedRequestError } from "../errors";
import { deleteData, parseCallbackData, rsvpData, viewData } from "../utils/callbackData";

describe("parseCallbackData", () => {
  it("parses view, delete and rsvp payloads", () => {
    expect(parseCallbackData("view:12")).toEqual({ kind: "view", eventId: 12 });
    expect(parseCallbackData("delete:3")).toEqual({ kind: "delete", eventId: 3 });
    expect(parseCallbackData("rsvp:5:no")).toEqual({ kind: "rsvp", eventId: 5, status: "no" });
  });

  it("leaves the rsvp status for the handler to judge", () => {
    expect(parseCallbackData("rsvp:5:perhaps")).toEqual({ kind: "rsvp", eventId: 5, status: "perhaps" });
  });

  it.each(["view:abc", "view:", "view:1:2", "delete:-1", "delete:1.5", "rsvp:5", "rsvp:x:yes", "rsvp:5:yes:extra"])(
    "rejects %j",
    (data) => {
      expect(() => parseCallbackData(data)).toThrow(MalformedRequestError);
    }
  );

  it("ignores payloads it does not own", () => {
    expect(parseCallbackData("r:done:1")).toBeNull();
    expect(parseCallbackData("")).toBeNull();
  });

  it("reads back what the builders write", () => {
    expect(parseCallbackData(viewData(9))).toEqual({ kind: "view", eventId: 9 });
    expect(parseCallbackData(deleteData(9))).toEqual({ kind: "delete", eventId: 9 });
    expect(parseCallbackData(rsvpData(9, "yes"))).toEqual({ kind: "rsvp", eventId: 9, status: "yes" });
  });
});

import { MalformedRequestError } from "../errors";
import { buildInviteLink, createBotIdentity, extractEventId } from "../utils/invite";

const opts = { host: "t.me", botUsername: "planner_bot" };

describe("invite links", () => {
  it("builds a deep link to the bot", () => {
    expect(buildInviteLink(42, opts)).toBe("https://t.me/planner_bot?start=join_42");
  });

  it("round-trips the event id", () => {
    expect(extractEventId(buildInviteLink(42, opts))).toBe(42);
    expect(extractEventId("join_42")).toBe(42);
  });

  it.each(["join_abc", "join_", "join_-3", "hello", "https://t.me/planner_bot?start=hello"])("rejects %j", (payload) => {
    expect(() => extractEventId(payload)).toThrow(MalformedRequestError);
  });
});

describe("createBotIdentity", () => {
  it("looks the username up once", async () => {
    const fetchUsername = jest.fn().mockResolvedValue("planner_bot");
    const identity = createBotIdentity(fetchUsername);

    const names = await Promise.all([identity.username(), identity.username()]);
    const again = await identity.username();

    expect(names).toEqual(["planner_bot", "planner_bot"]);
    expect(again).toBe("planner_bot");
    expect(fetchUsername).toHaveBeenCalledTimes(1);
  });

  it("tries again after a failed lookup", async () => {
    const fetchUsername = jest.fn().mockRejectedValueOnce(new Error("down")).mockResolvedValueOnce("planner_bot");
    const identity = createBotIdentity(fetchUsername);

    await expect(identity.username()).rejects.toThrow("down");
    await expect(identity.username()).resolves.toBe("planner_bot");
    expect(fetchUsername).toHaveBeenCalledTimes(2);
  });
});

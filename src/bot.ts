import { Context, Telegraf } from "telegraf";

import type { PlannerController } from "./commands/planner";
import type { Actor } from "./commands/chatPort";
import { createTelegramChat } from "./commands/telegramChat";

export const BOT_COMMANDS = [
  { command: "new", description: "Create an event for tomorrow" },
  { command: "my", description: "Manage events you created" },
  { command: "cancel", description: "Stop creating an event" },
  { command: "help", description: "Show all commands" },
];

function actorOf(ctx: Context): Actor | null {
  const userId = ctx.from?.id;
  if (typeof userId !== "number") return null;
  return { userId, isPrivate: ctx.chat?.type === "private" };
}

export function createBot(token: string) {
  const bot = new Telegraf(token);

  // Basic update log (helps debugging without being noisy)
  bot.use(async (ctx, next) => {
    console.log("[BOT] Update received:", ctx.updateType);
    return next();
  });

  bot.catch((err, ctx) => {
    console.error(`[BOT] Error while handling ${ctx.updateType}:`, err);
  });

  return bot;
}

export function registerPlanner(bot: Telegraf, planner: PlannerController) {
  bot.start(async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    await planner.start(actor, createTelegramChat(ctx), ctx.payload);
  });

  bot.help(async (ctx) => {
    await planner.help(createTelegramChat(ctx));
  });

  bot.command("new", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    await planner.newEvent(actor, createTelegramChat(ctx));
  });

  bot.command("cancel", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    await planner.cancel(actor, createTelegramChat(ctx));
  });

  bot.command("my", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    await planner.myEvents(actor, createTelegramChat(ctx));
  });

  /* ----------------------------
     Buttons: view:<id>, delete:<id>, rsvp:<id>:<status>
  ----------------------------- */

  bot.on("callback_query", async (ctx) => {
    const actor = actorOf(ctx);
    if (!actor) return;
    const data = "data" in ctx.callbackQuery ? ctx.callbackQuery.data : "";
    await planner.callback(actor, createTelegramChat(ctx), data);
  });

  /* ----------------------------
     /new dialogue input
  ----------------------------- */

  bot.on("text", async (ctx, next) => {
    const actor = actorOf(ctx);
    if (!actor) return next();

    // Don't treat unknown commands as answers
    if (ctx.message.text.startsWith("/")) return next();

    const consumed = await planner.input(actor, createTelegramChat(ctx), { kind: "text", text: ctx.message.text });
    if (!consumed) return next();
  });

  bot.on("location", async (ctx, next) => {
    const actor = actorOf(ctx);
    if (!actor) return next();

    const { latitude, longitude } = ctx.message.location;
    const consumed = await planner.input(actor, createTelegramChat(ctx), { kind: "location", latitude, longitude });
    if (!consumed) return next();
  });
}

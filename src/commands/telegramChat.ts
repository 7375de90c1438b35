// src/commands/telegramChat.ts
import { Context, Markup, TelegramError } from "telegraf";
import { TransportDeliveryError } from "../errors";
import type { ActionRows } from "../views/eventView";
import type { ChatPort, DeliveryOutcome } from "./chatPort";

export function toKeyboard(rows?: ActionRows) {
  if (!rows) return undefined;
  return Markup.inlineKeyboard(rows.map((row) => row.map((b) => Markup.button.callback(b.text, b.data))));
}

function isNotModified(e: TelegramError) {
  return e.description.includes("message is not modified");
}

/**
 * ChatPort over a Telegraf context.
 */
export function createTelegramChat(ctx: Context): ChatPort {
  async function send(text: string, actions?: ActionRows) {
    await ctx.reply(text, {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
      ...toKeyboard(actions),
    });
  }

  async function reply(text: string) {
    const messageId = ctx.message?.message_id;
    await ctx.reply(text, {
      parse_mode: "HTML",
      ...(messageId ? { reply_parameters: { message_id: messageId } } : {}),
    });
  }

  async function answer(text?: string, opts: { alert?: boolean } = {}) {
    if (!ctx.callbackQuery) return;
    try {
      await ctx.answerCbQuery(text, { show_alert: Boolean(opts.alert) });
    } catch (e) {
      // Telegram rejects answers to stale queries; the update itself was handled.
      console.error("[BOT] answerCbQuery failed:", e);
    }
  }

  async function updateOrSend(text: string, actions?: ActionRows): Promise<DeliveryOutcome> {
    if (!ctx.callbackQuery?.message) {
      await send(text, actions);
      return { mode: "sent", reason: new TransportDeliveryError("No message to edit") };
    }

    try {
      await ctx.editMessageText(text, { parse_mode: "HTML", ...toKeyboard(actions) });
      return { mode: "edited" };
    } catch (e) {
      if (!(e instanceof TelegramError)) throw e;
      if (isNotModified(e)) return { mode: "unchanged" };

      await send(text, actions);
      return { mode: "sent", reason: new TransportDeliveryError(e.description, e) };
    }
  }

  return { send, reply, answer, updateOrSend };
}

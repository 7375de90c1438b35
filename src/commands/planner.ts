import {
  AuthorizationError,
  MalformedRequestError,
  NotFoundError,
  PlannerError,
} from "../errors";
import { applyInput, DialogueInput, StepOutcome, startConversation } from "../flows/newEvent";
import { EventStore, PlannedEvent, RsvpStatus, isRsvpStatus } from "../services/eventStore";
import type { ConversationState, SessionStore } from "../state/conversationStore";
import { CallbackAction, parseCallbackData } from "../utils/callbackData";
import { BotIdentity, buildInviteLink, extractEventId, isJoinPayload } from "../utils/invite";
import {
  renderEvent,
  renderEventSummary,
  renderManageActions,
  renderRsvpActions,
} from "../views/eventView";
import { TEXT, promptFor, rsvpSetNotice } from "../views/messages";
import type { Actor, ChatPort } from "./chatPort";

/**
 * Dialogue + callback controller
 * - Commands: /start [join_<id>], /help, /new, /cancel, /my
 * - Buttons: view:<id>, delete:<id>, rsvp:<id>:<status>
 * - Free text / location pins feed the /new dialogue
 * Persistence goes through EventStore only.
 */

export type PlannerDeps = {
  store: EventStore;
  sessions: SessionStore<ConversationState>;
  identity: BotIdentity;
  inviteHost: string;
};

export function createPlannerController(deps: PlannerDeps) {
  const { store, sessions, identity } = deps;

  async function inviteLinkFor(eventId: number) {
    const botUsername = await identity.username();
    return buildInviteLink(eventId, { host: deps.inviteHost, botUsername });
  }

  async function requireEvent(eventId: number): Promise<PlannedEvent> {
    const event = await store.getEvent(eventId);
    if (!event) throw new NotFoundError(TEXT.EVENT_NOT_FOUND);
    return event;
  }

  // Organizer, or anyone holding an RSVP row (opening the invite link creates one).
  async function hasAccess(event: PlannedEvent, userId: number) {
    if (event.organizerId === userId) return true;
    return (await store.getRsvp(event.id, userId)) !== null;
  }

  async function renderForViewer(event: PlannedEvent, userId: number, knownStatus?: RsvpStatus) {
    const [counts, rsvp] = await Promise.all([
      store.rsvpCounts(event.id),
      knownStatus ? Promise.resolve(null) : store.getRsvp(event.id, userId),
    ]);
    const viewerStatus = knownStatus ?? rsvp?.status ?? null;
    const inviteLink = event.organizerId === userId ? await inviteLinkFor(event.id) : undefined;
    return renderEvent(event, { viewerStatus, counts, inviteLink });
  }

  /* ----------------------------
     Commands
  ----------------------------- */

  async function start(actor: Actor, chat: ChatPort, payload?: string) {
    const arg = payload?.trim() ?? "";
    if (!isJoinPayload(arg)) {
      await chat.send(TEXT.GREETING);
      return;
    }

    let eventId: number;
    try {
      eventId = extractEventId(arg);
    } catch (e) {
      if (!(e instanceof MalformedRequestError)) throw e;
      await chat.reply(TEXT.INVALID_INVITE);
      return;
    }

    await join(actor, chat, eventId);
  }

  async function join(actor: Actor, chat: ChatPort, eventId: number) {
    if (!actor.isPrivate) {
      await chat.reply(TEXT.JOIN_PRIVATE_ONLY);
      return;
    }

    const event = await store.getEvent(eventId);
    if (!event) {
      await chat.reply(TEXT.EVENT_GONE);
      return;
    }

    let status: RsvpStatus;
    try {
      status = (await store.joinEvent(eventId, actor.userId, "maybe")).status;
    } catch (e) {
      if (!(e instanceof NotFoundError)) throw e;
      await chat.reply(TEXT.EVENT_GONE);
      return;
    }

    const counts = await store.rsvpCounts(eventId);
    const text = `${TEXT.INVITED_HEADER}\n\n${renderEvent(event, { viewerStatus: status, counts })}`;
    await chat.send(text, renderRsvpActions(eventId));
  }

  async function help(chat: ChatPort) {
    await chat.send(TEXT.HELP);
  }

  async function newEvent(actor: Actor, chat: ChatPort) {
    if (!actor.isPrivate) {
      await chat.reply(TEXT.NEW_PRIVATE_ONLY);
      return;
    }

    // Replaces any unfinished dialogue without asking.
    sessions.set(actor.userId, startConversation());
    await chat.send(promptFor("title"));
  }

  async function cancel(actor: Actor, chat: ChatPort) {
    const cleared = sessions.clear(actor.userId);
    await chat.reply(cleared ? TEXT.CANCELLED : TEXT.NOTHING_TO_CANCEL);
  }

  async function myEvents(actor: Actor, chat: ChatPort) {
    if (!actor.isPrivate) {
      await chat.reply(TEXT.MY_PRIVATE_ONLY);
      return;
    }

    const events = await store.listEventsByUser(actor.userId);
    if (events.length === 0) {
      await chat.send(TEXT.NO_EVENTS);
      return;
    }

    for (const event of events) {
      await chat.send(renderEventSummary(event), renderManageActions(event.id));
    }
  }

  /* ----------------------------
     Dialogue input
  ----------------------------- */

  /** Returns false when the user has no dialogue in progress, or writes outside the private chat. */
  async function input(actor: Actor, chat: ChatPort, message: DialogueInput): Promise<boolean> {
    if (!actor.isPrivate) return false;

    const outcome = sessions.update<StepOutcome | null>(actor.userId, (current) => {
      if (!current) return { next: undefined, result: null };
      const out = applyInput(current, message);
      if (out.kind === "invalid") return { next: undefined, result: out };
      if (out.kind === "next") return { next: out.state, result: out };
      return { next: null, result: out };
    });

    if (!outcome) return false;

    if (outcome.kind === "invalid") {
      await chat.reply(outcome.error.message);
      return true;
    }

    if (outcome.kind === "next") {
      await chat.send(promptFor(outcome.step));
      return true;
    }

    let event: PlannedEvent;
    try {
      event = await store.createEvent(actor.userId, outcome.event);
    } catch (e) {
      await chat.reply(TEXT.SAVE_FAILED);
      throw e;
    }
    console.log(`[BOT] Event ${event.id} created by ${actor.userId}`);

    const counts = await store.rsvpCounts(event.id);
    const inviteLink = await inviteLinkFor(event.id);
    const text = `${TEXT.SAVED_HEADER}\n\n${renderEvent(event, { viewerStatus: null, counts, inviteLink })}`;
    await chat.send(text, renderRsvpActions(event.id));
    return true;
  }

  /* ----------------------------
     Buttons
  ----------------------------- */

  async function view(actor: Actor, chat: ChatPort, eventId: number) {
    const event = await requireEvent(eventId);
    if (!(await hasAccess(event, actor.userId))) throw new AuthorizationError(TEXT.NO_ACCESS);

    const text = await renderForViewer(event, actor.userId);
    await chat.answer();
    await chat.send(text, renderRsvpActions(eventId));
  }

  async function remove(actor: Actor, chat: ChatPort, eventId: number) {
    const event = await requireEvent(eventId);
    if (event.organizerId !== actor.userId) throw new AuthorizationError(TEXT.DELETE_NOT_OWNER);

    const deleted = await store.deleteEvent(eventId, actor.userId);
    if (!deleted) throw new NotFoundError(TEXT.EVENT_NOT_FOUND);

    console.log(`[BOT] Event ${eventId} deleted by ${actor.userId}`);
    await chat.answer(TEXT.DELETED);
    await chat.updateOrSend(TEXT.DELETED);
  }

  async function rsvp(actor: Actor, chat: ChatPort, eventId: number, status: string) {
    if (!isRsvpStatus(status)) throw new MalformedRequestError(TEXT.UNKNOWN_OPTION, status);

    const event = await requireEvent(eventId);
    if (!(await hasAccess(event, actor.userId))) throw new AuthorizationError(TEXT.JOIN_FIRST);

    await store.upsertRsvp(eventId, actor.userId, status);

    const text = await renderForViewer(event, actor.userId, status);
    const outcome = await chat.updateOrSend(text, renderRsvpActions(eventId));
    if (outcome.mode === "sent") {
      console.log(`[BOT] RSVP view for event ${eventId} re-sent: ${outcome.reason.message}`);
    }
    await chat.answer(rsvpSetNotice(status));
  }

  async function dispatch(actor: Actor, chat: ChatPort, action: CallbackAction) {
    switch (action.kind) {
      case "view":
        return view(actor, chat, action.eventId);
      case "delete":
        return remove(actor, chat, action.eventId);
      case "rsvp":
        return rsvp(actor, chat, action.eventId, action.status);
    }
  }

  async function callback(actor: Actor, chat: ChatPort, data: string) {
    let action: CallbackAction | null;
    try {
      action = parseCallbackData(data);
    } catch (e) {
      if (!(e instanceof MalformedRequestError)) throw e;
      await chat.answer(TEXT.INVALID_DATA, { alert: true });
      return;
    }

    if (!action) {
      await chat.answer();
      return;
    }

    try {
      await dispatch(actor, chat, action);
    } catch (e) {
      if (!(e instanceof PlannerError)) throw e;
      const message = e instanceof NotFoundError ? TEXT.EVENT_NOT_FOUND : e.message;
      await chat.answer(message, { alert: true });
    }
  }

  return {
    start,
    help,
    newEvent,
    cancel,
    myEvents,
    input,
    callback,
  };
}

export type PlannerController = ReturnType<typeof createPlannerController>;

import { loadConfig } from "./config";
import { connectDb, disconnectDb } from "./db";
import { BOT_COMMANDS, createBot, registerPlanner } from "./bot";
import { startServer } from "./server/startServer";
import { createPlannerController } from "./commands/planner";
import { createMongoEventStore } from "./services/event.service";
import { createMemorySessionStore, ConversationState } from "./state/conversationStore";
import { createBotIdentity } from "./utils/invite";

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main() {
  // Throws on a missing BOT_TOKEN before anything else starts
  const config = loadConfig();

  const conn = await connectDb(config.mongoUri);
  console.log("[DB] Connected to MongoDB:", conn.name);

  const bot = createBot(config.botToken);

  const identity = createBotIdentity(async () => {
    const me = await bot.telegram.getMe();
    return me.username;
  });

  const planner = createPlannerController({
    store: createMongoEventStore(),
    sessions: createMemorySessionStore<ConversationState>(),
    identity,
    inviteHost: config.inviteHost,
  });

  registerPlanner(bot, planner);

  const username = await identity.username();
  console.log("[BOT] Bot identity:", `@${username}`);

  await bot.telegram.setMyCommands(BOT_COMMANDS);

  const server = startServer({ port: config.port });

  // launch() resolves only when polling stops
  void bot.launch({ dropPendingUpdates: true }).catch((e) => {
    console.error("[BOT] Polling stopped with error:", e);
    process.exit(1);
  });
  console.log("[BOT] Bot launched.");

  async function shutdown(signal: string) {
    console.log(`Shutdown signal received: ${signal}`);

    try {
      bot.stop(signal);
    } catch (e) {
      console.error("[BOT] Bot stop error:", e);
    }

    server.close();
    await disconnectDb();

    // Small delay to let logs flush
    await sleep(250);

    process.exit(0);
  }

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((e) => {
  console.error("Fatal startup error:", e);
  process.exit(1);
});

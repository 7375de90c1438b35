import http from "http";
import { sendText } from "./router";
import { healthRoute } from "../routes/healthRoute";

type ServerOptions = {
  port: number;
};

export function startServer(opts: ServerOptions) {
  const server = http.createServer(async (req, res) => {
    const rawUrl = req.url || "/";
    const url = rawUrl.split("?")[0].replace(/(.)\/+$/, "$1");
    const method = (req.method || "GET").toUpperCase();

    console.log(`[HTTP] ${method} ${rawUrl}`);

    // Health
    if (url === "/health") return healthRoute(req, res);

    // Default
    sendText(res, 200, "Bot is running. Use /health for status.");
  });

  server.listen(opts.port, "0.0.0.0", () => {
    console.log(`[HTTP] Listening on port ${opts.port}`);
    console.log(`[HTTP] Health endpoint: /health`);
  });

  return server;
}

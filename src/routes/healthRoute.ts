// src/routes/healthRoute.ts
import http from "http";
import mongoose from "mongoose";
import { sendText } from "../server/router";

// 1 = connected
export function isDbReady() {
  return mongoose.connection.readyState === 1;
}

export async function healthRoute(_req: http.IncomingMessage, res: http.ServerResponse) {
  if (!isDbReady()) return sendText(res, 503, "DB not ready");
  sendText(res, 200, "OK");
}

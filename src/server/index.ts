import http from "http";
import { createHttpApp } from "./http";
import { GameStore } from "./store";
import { DEFAULT_GATEWAY_OPTIONS, WebSocketGateway } from "./ws";

// Simple bootstrap that wires the in-memory store to HTTP + WebSocket layers.

const PORT = process.env.PORT ? Number(process.env.PORT) : 3000;
const DECISION_TIMEOUT_MS = process.env.DECISION_TIMEOUT_MS
  ? Number(process.env.DECISION_TIMEOUT_MS)
  : DEFAULT_GATEWAY_OPTIONS.decisionTimeoutMs;

const store = new GameStore();
const app = createHttpApp(store);
const server = http.createServer(app);

const gateway = new WebSocketGateway(store, { decisionTimeoutMs: DECISION_TIMEOUT_MS });
gateway.attach(server);

server.listen(PORT, () => {
  console.log(`Grimoire server running on port ${PORT}`);
  console.log("Health check: GET /health");
  console.log(`Decision timeout: ${DECISION_TIMEOUT_MS}ms`);
});

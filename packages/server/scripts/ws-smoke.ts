import WebSocket from "ws";

// Manual smoke script: connects two clients, races a text update and uploads a file.
const SERVER_URL = process.env.WS_URL ?? "ws://localhost:56321/ws";
const HTTP_URL = SERVER_URL.replace(/^ws/, "http").replace(/\/ws$/, "");

function connectClient(label: string) {
  const socket = new WebSocket(SERVER_URL);

  socket.on("message", (data) => {
    console.log(`[${label}]`, data.toString());
  });

  return socket;
}

const clientA = connectClient("A");
const clientB = connectClient("B");

setTimeout(() => {
  // Both submit against version 0; one of them receives text_conflict.
  clientA.send(JSON.stringify({ type: "text", content: "hello from A", version: 0 }));
  clientB.send(JSON.stringify({ type: "text", content: "hello from B", version: 0 }));
}, 500);

setTimeout(() => {
  fetch(`${HTTP_URL}/upload?filename=smoke.txt`, {
    method: "POST",
    headers: { "content-type": "text/plain" },
    body: "smoke test payload",
  })
    .then((res) => res.json())
    .then((meta) => console.log("[upload]", meta))
    .catch((error) => console.error("[upload] failed", error));
}, 1000);

setTimeout(() => {
  clientA.close();
  clientB.close();
}, 2000);

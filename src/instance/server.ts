#!/usr/bin/env tsx
// Minimal HTTP responder staged into each instance directory. Depends on
// nothing outside Node so a copy runs from any directory.
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import { hostname } from "os";
import { pathToFileURL } from "url";

export interface InstanceOptions {
  name: string;
  port: number;
}

type Level = "INFO" | "WARNING" | "ERROR";

const NAME_PATTERN = /^[a-z]{1,32}$/;

function log(level: Level, name: string, message: string): void {
  const timestamp = new Date().toISOString().slice(0, 19);
  console.log(`${timestamp}Z [${level}] [${name}] ${message}`);
}

// `--name`/`--port`, falling back to INSTANCE_NAME/PORT, then "server"/8000.
export function parseInstanceArgs(argv: string[], env: NodeJS.ProcessEnv): InstanceOptions | string {
  let name = env.INSTANCE_NAME ?? "server";
  let rawPort = env.PORT ?? "8000";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--name" && value !== undefined) {
      name = value;
      i++;
    } else if (arg === "--port" && value !== undefined) {
      rawPort = value;
      i++;
    } else {
      return `unexpected argument: ${arg}`;
    }
  }

  if (!NAME_PATTERN.test(name)) {
    return "--name must be 1..32 lowercase Latin letters [a-z]";
  }

  if (!/^\d+$/.test(rawPort.trim())) {
    return "--port must be an integer";
  }

  return { name, port: Number.parseInt(rawPort, 10) };
}

function send(res: ServerResponse, status: number, contentType: string, body: string): number {
  const payload = Buffer.from(body);
  res.writeHead(status, {
    "Content-Type": contentType,
    "Content-Length": payload.length,
  });
  res.end(payload);
  return payload.length;
}

export function createInstanceServer(name: string, startedAt: Date = new Date()): Server {
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const path = req.url ?? "/";

    if (req.method !== "GET") {
      send(res, 405, "text/plain; charset=utf-8", "Method not allowed");
      log("WARNING", name, `${req.method} ${path} -> 405`);
      return;
    }

    if (path === "/" || path === "/whoami") {
      const address = server.address();
      const payload = {
        message: `Hello from instance '${name}'`,
        instance: name,
        pid: process.pid,
        port: address !== null && typeof address === "object" ? address.port : null,
        host: hostname(),
        started_at: startedAt.toISOString(),
        uptime_sec: Math.round(Date.now() - startedAt.getTime()) / 1000,
        path,
        client: req.socket.remoteAddress ?? null,
      };
      const bytes = send(res, 200, "application/json; charset=utf-8", JSON.stringify(payload, null, 2));
      log("INFO", name, `GET ${path} -> 200 (${bytes} bytes)`);
      return;
    }

    if (path === "/health" || path === "/healthcheck") {
      send(res, 200, "text/plain; charset=utf-8", "OK");
      log("INFO", name, `GET ${path} -> 200`);
      return;
    }

    send(res, 404, "text/plain; charset=utf-8", "Not found");
    log("WARNING", name, `GET ${path} -> 404`);
  });

  return server;
}

function main(): void {
  const options = parseInstanceArgs(process.argv.slice(2), process.env);
  if (typeof options === "string") {
    console.error(`ERROR: ${options}`);
    process.exit(2);
  }

  const { name, port } = options;
  const server = createInstanceServer(name);

  // tmux sends SIGHUP when the hosting window is killed.
  const shutdown = (signal: NodeJS.Signals): void => {
    log("INFO", name, `received ${signal}, shutting down...`);
    server.close(() => {
      log("INFO", name, "server stopped");
      process.exit(0);
    });
    server.closeAllConnections();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  process.on("SIGHUP", shutdown);

  server.on("error", (error) => {
    log("ERROR", name, error.message);
    process.exit(1);
  });

  server.listen(port, "0.0.0.0", () => {
    log("INFO", name, `starting HTTP on port ${port}, pid=${process.pid}`);
    log("INFO", name, `try: curl http://localhost:${port}/whoami`);
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import type { Subscription } from "rxjs";
import { z } from "zod";
import type { EventBus } from "../event/EventBus.js";
import type { KnowledgeAdapter, TaskEvent, TaskSubmitter } from "../types/index.js";

/**
 * 桥接服务器配置选项
 */
export interface TaskBridgeOptions {
  service: TaskSubmitter;
  eventBus: EventBus;
  knowledge: Pick<KnowledgeAdapter, "addKnowledge">;
  /** CORS 允许的源，默认为 "*" */
  allowOrigin?: string;
  /** 请求体上限（字节），超出返回 413 */
  maxBodyBytes?: number;
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const TaskRequestSchema = z.object({
  prompt: z.string().trim().min(1, "prompt is required"),
});

const KnowledgeRequestSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  content: z.string().min(1, "content is required"),
});

/** SSE 客户端类型，使用 ServerResponse 表示 */
type SseClient = ServerResponse;

class RequestBodyError extends Error {
  constructor(public readonly status: 400 | 413, message: string) {
    super(message);
  }
}

/**
 * 创建任务桥接服务器：
 *    - GET /health: 健康检查
 *    - GET /events: SSE 事件流，实时推送任务事件
 *    - POST /api/tasks: 提交任务，立即返回 task_id
 *    - POST /api/knowledge: 写入一条知识
 *
 * 返回的服务器尚未 listen，由调用方决定端口。
 */
export function createTaskBridge(options: TaskBridgeOptions): Server {
  const allowOrigin = options.allowOrigin ?? "*";
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const clients = new Set<SseClient>();
  let subscription: Subscription | null = null;

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[task-bridge] ${req.method ?? "?"} ${req.url ?? "?"} failed: ${message}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: message });
      } else {
        res.end();
      }
    });
  });

  server.on("listening", () => {
    // 有服务器在监听时才订阅总线，关闭时退订
    subscription = options.eventBus.events().subscribe((event) => broadcast(event));
  });

  server.on("close", () => {
    subscription?.unsubscribe();
    subscription = null;
    for (const client of clients) {
      client.end();
    }
    clients.clear();
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    setCorsHeaders(res, allowOrigin);
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    if (req.method === "GET" && pathname === "/events") {
      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });
      res.write("\n");
      clients.add(res);
      req.on("close", () => {
        clients.delete(res);
      });
      return;
    }

    if (req.method === "POST" && pathname === "/api/tasks") {
      const body = await readBody(req, TaskRequestSchema, maxBodyBytes);
      if (!body.success) {
        sendBodyError(res, body);
        return;
      }
      const handle = options.service.submit(body.data.prompt);
      sendJson(res, 202, { status: "Task received", task_id: handle.taskId });
      return;
    }

    if (req.method === "POST" && pathname === "/api/knowledge") {
      const body = await readBody(req, KnowledgeRequestSchema, maxBodyBytes);
      if (!body.success) {
        sendBodyError(res, body);
        return;
      }
      const message = await options.knowledge.addKnowledge(body.data.name, body.data.content);
      sendJson(res, 201, { message });
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  }

  function broadcast(event: TaskEvent) {
    const data = JSON.stringify(event);
    for (const client of clients) {
      writeSse(client, "task-event", data);
    }
  }

  return server;
}

/**
 * 按照 SSE 协议写入一条事件：event 行 + data 行 + 空行
 */
export function writeSse(res: ServerResponse, event: string, data: string) {
  res.write(`event: ${event}\n`);
  res.write(`data: ${data}\n\n`);
}

function setCorsHeaders(res: ServerResponse, origin: string) {
  res.setHeader("Access-Control-Allow-Origin", origin);
  res.setHeader("Access-Control-Allow-Headers", "content-type");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

interface BodyFailure {
  success: false;
  status: 400 | 413;
  error: string;
}

type BodyResult<T> = { success: true; data: T } | BodyFailure;

function sendBodyError(res: ServerResponse, failure: BodyFailure) {
  if (failure.status === 413) {
    // 请求体没有读完，响应后关闭连接
    res.setHeader("Connection", "close");
  }
  sendJson(res, failure.status, { error: failure.error });
}

async function readBody<T>(
  req: IncomingMessage,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  maxBytes: number
): Promise<BodyResult<T>> {
  let payload: unknown;
  try {
    payload = await readJson(req, maxBytes);
  } catch (error) {
    if (error instanceof RequestBodyError) {
      return { success: false, status: error.status, error: error.message };
    }
    throw error;
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    return {
      success: false,
      status: 400,
      error: parsed.error.issues.map((issue) => issue.message).join("; "),
    };
  }
  return { success: true, data: parsed.data };
}

/**
 * 读取请求体并解析为 JSON，空请求体视为空对象
 */
async function readJson(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const tooLarge = () =>
    new RequestBodyError(413, `Request body exceeds ${maxBytes} bytes`);
  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw tooLarge();
  }

  const chunks: Uint8Array[] = [];
  let received = 0;
  for await (const chunk of req) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    received += bytes.length;
    if (received > maxBytes) {
      throw tooLarge();
    }
    chunks.push(bytes);
  }
  const raw = Buffer.concat(chunks).toString("utf-8");
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new RequestBodyError(400, "Request body is not valid JSON");
  }
}

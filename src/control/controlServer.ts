import { WebSocketServer, WebSocket } from "ws";
import type { AddressInfo } from "node:net";

import type { ControlSettings, Logger } from "../types";
import { APP_ERROR } from "../shared/appErrorCodes";
import type { Result } from "../shared/result";
import {
  ControlRequestIdSchema,
  ControlRequestSchema,
  type ControlAction,
  type ControlResponse,
} from "../shared/validation/controlProtocolSchemas";

export type ControlRequestHandler = (action: ControlAction) => Promise<Result<unknown>>;

/**
 * Сервер канала управления демоном: локальный WebSocket, один JSON-запрос → один JSON-ответ.
 *
 * Ответ уходит в тот сокет, из которого пришёл запрос; клиентов может быть несколько сразу
 * (CLI и ярлык жеста), состояние записи у них общее.
 */
export class ControlServer {
  private wss: WebSocketServer | null = null;
  private url: string | null = null;

  constructor(
    private readonly params: {
      settings: Pick<ControlSettings, "host" | "port" | "path">;
      handle: ControlRequestHandler;
      log: Logger;
    },
  ) {}

  /** Начать слушать; промис завершается адресом сервера или ошибкой bind (порт занят и т.п.). */
  async listen(): Promise<string> {
    if (this.wss && this.url) return this.url;
    const { host, port, path } = this.params.settings;
    const wss = new WebSocketServer({ host, port, path });
    this.wss = wss;

    wss.on("connection", (ws) => {
      ws.on("message", (data) => {
        this.onMessage(ws, data).catch((e: unknown) => {
          this.params.log.error("не удалось обработать запрос", { error: String(e ?? "") });
        });
      });
      ws.on("error", (e) => {
        this.params.log.warn("ошибка сокета клиента", { error: String(e ?? "") });
      });
    });

    return await new Promise<string>((resolve, reject) => {
      const onError = (e: Error) => {
        this.wss = null;
        reject(e);
      };
      wss.once("error", onError);
      wss.once("listening", () => {
        wss.off("error", onError);
        wss.on("error", (e) => this.params.log.error("ошибка сервера управления", { error: String(e ?? "") }));
        const addr = wss.address();
        const actualPort = isAddressInfo(addr) ? addr.port : port;
        this.url = `ws://${host}:${actualPort}${path}`;
        this.params.log.info("канал управления слушает", { url: this.url });
        resolve(this.url);
      });
    });
  }

  getUrl(): string | null {
    return this.url;
  }

  async close(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    this.url = null;
    if (!wss) return;
    for (const client of wss.clients) {
      try {
        client.close();
      } catch (e) {
        this.params.log.warn("не удалось закрыть сокет клиента", { error: String(e ?? "") });
      }
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }

  private async onMessage(ws: WebSocket, data: WebSocket.RawData): Promise<void> {
    const payload = this.tryParse(data);
    const parsed = ControlRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const idOnly = ControlRequestIdSchema.safeParse(payload);
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      if (!idOnly.success) {
        this.params.log.warn("невалидный запрос без id, отбрасываем", { issues });
        return;
      }
      this.params.log.warn("невалидный запрос", { id: idOnly.data.id, issues });
      this.reply(ws, { id: idOnly.data.id, ok: false, error: { code: APP_ERROR.VALIDATION, message: "Невалидный запрос", cause: issues } });
      return;
    }

    const { id, action } = parsed.data;
    const result = await this.params.handle(action);
    this.reply(ws, result.ok ? { id, ok: true, value: result.value } : { id, ok: false, error: result.error });
  }

  private reply(ws: WebSocket, response: ControlResponse): void {
    if (ws.readyState !== WebSocket.OPEN) {
      this.params.log.warn("клиент отключился до ответа", { id: response.id });
      return;
    }
    ws.send(JSON.stringify(response));
  }

  private tryParse(data: WebSocket.RawData): unknown {
    try {
      const text = data?.toString();
      return text ? JSON.parse(text) : null;
    } catch {
      return null;
    }
  }
}

function isAddressInfo(v: string | AddressInfo | null): v is AddressInfo {
  return typeof v === "object" && v !== null;
}

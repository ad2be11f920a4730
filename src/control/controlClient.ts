import { randomUUID } from "node:crypto";
import { WebSocket } from "ws";

import type { ControlSettings } from "../types";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";
import {
  ControlResponseSchema,
  type ControlAction,
  type ControlRequest,
} from "../shared/validation/controlProtocolSchemas";

export function controlUrl(settings: Pick<ControlSettings, "host" | "port" | "path">): string {
  return `ws://${settings.host}:${settings.port}${settings.path}`;
}

/**
 * Клиент канала управления: одно соединение на один запрос.
 *
 * Ошибки транспорта не бросаются: демон недоступен → `E_DAEMON_UNAVAILABLE`,
 * нет ответа за `requestTimeoutMs` → `E_TIMEOUT`.
 */
export class ControlClient {
  constructor(
    private readonly params: {
      settings: ControlSettings;
      nowMs?: () => number;
      makeId?: () => string;
    },
  ) {}

  async request(action: ControlAction): Promise<Result<unknown>> {
    const url = controlUrl(this.params.settings);
    const timeoutMs = this.params.settings.requestTimeoutMs;
    const req: ControlRequest = {
      id: (this.params.makeId ?? randomUUID)(),
      ts: (this.params.nowMs ?? Date.now)(),
      action,
    };

    return await new Promise<Result<unknown>>((resolve) => {
      let settled = false;
      let opened = false;
      const ws = new WebSocket(url);

      const finish = (r: Result<unknown>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.removeAllListeners("close");
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) ws.terminate();
        resolve(r);
      };

      const timer = setTimeout(() => {
        finish(err({ code: APP_ERROR.TIMEOUT, message: `Демон записи не ответил за ${timeoutMs} мс`, details: { url, kind: action.kind } }));
      }, timeoutMs);

      ws.on("open", () => {
        opened = true;
        ws.send(JSON.stringify(req));
      });

      ws.on("message", (data) => {
        let payload: unknown;
        try {
          payload = JSON.parse(data.toString());
        } catch {
          finish(err({ code: APP_ERROR.VALIDATION, message: "Демон прислал невалидный JSON" }));
          return;
        }
        const parsed = ControlResponseSchema.safeParse(payload);
        if (!parsed.success) {
          finish(err({ code: APP_ERROR.VALIDATION, message: "Демон прислал невалидный ответ", cause: parsed.error.message }));
          return;
        }
        // Чужой id: ответ не на наш запрос, ждём дальше.
        if (parsed.data.id !== req.id) return;
        finish(parsed.data.ok ? ok(parsed.data.value) : err(parsed.data.error));
      });

      ws.on("error", (e: Error) => {
        if (opened) {
          finish(err({ code: APP_ERROR.INTERNAL, message: "Соединение с демоном записи оборвалось", cause: e.message }));
          return;
        }
        finish(
          err({
            code: APP_ERROR.DAEMON_UNAVAILABLE,
            message: "Демон записи не запущен (stealth-recorder daemon)",
            cause: e.message,
            details: { url },
          }),
        );
      });

      ws.on("close", () => {
        finish(err({ code: APP_ERROR.DAEMON_UNAVAILABLE, message: "Демон записи закрыл соединение без ответа", details: { url } }));
      });
    });
  }
}

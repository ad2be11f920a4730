import type { Logger } from "../../types";
import { normalizeGestureAction } from "../../domain/policies/gestureAction";
import { toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";
import type { AppErrorDto } from "../../shared/result";
import { IDLE_SENTINEL, type RecordingSessionUseCase } from "./recordingSessionUseCase";

export type GestureOutcome =
  | { kind: "started"; fileName: string }
  | { kind: "stopped"; fileName: string }
  | { kind: "idle" }
  | { kind: "permission_denied" }
  | { kind: "failed"; error: AppErrorDto }
  | { kind: "ignored"; action: string };

type SessionPort = Pick<RecordingSessionUseCase, "requestPermission" | "start" | "stop">;

/**
 * Вход “жест ОС”: ярлык открывает `stealthrecorder://start|stop` вне обычного UI-цикла.
 *
 * Работает с той же сессией, что и UI-команды (singleton из DI), поэтому жест и CLI
 * всегда согласны, идёт ли запись.
 */
export class GestureUseCase {
  constructor(private readonly deps: { session: SessionPort; log: Logger }) {}

  async handle(rawAction: string | null | undefined): Promise<GestureOutcome> {
    const action = normalizeGestureAction(rawAction);
    this.deps.log.info("handleGesture", { action: rawAction ?? null });

    if (action === "start") {
      // Разрешение спрашиваем каждый раз (даже если уже выдано): повторный запрос безвреден.
      const granted = await this.deps.session.requestPermission();
      this.deps.log.info("доступ к микрофону", { granted });
      if (!granted) return { kind: "permission_denied" };
      try {
        const fileName = await this.deps.session.start();
        return { kind: "started", fileName };
      } catch (e) {
        const error = toAppErrorDto(e, { code: APP_ERROR.RECORDING_CONFIG, message: "Не удалось начать запись по жесту" });
        this.deps.log.error("запись по жесту не началась", { code: error.code, message: error.message });
        return { kind: "failed", error };
      }
    }

    if (action === "stop") {
      const result = await this.deps.session.stop();
      return result === IDLE_SENTINEL ? { kind: "idle" } : { kind: "stopped", fileName: result };
    }

    this.deps.log.warn("неизвестное действие жеста, игнорируем", { action: rawAction ?? null });
    return { kind: "ignored", action: String(rawAction ?? "") };
  }
}

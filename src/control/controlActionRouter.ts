import type { Logger } from "../types";
import type { RecorderFacade } from "../application/recording/recorderFacade";
import { toAppErrorDto } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";
import type { ControlAction } from "../shared/validation/controlProtocolSchemas";

export type RecorderControlPort = Pick<
  RecorderFacade,
  "requestPermission" | "startResult" | "stopResult" | "isActive" | "getStatus" | "listFiles" | "handleGesture"
>;

/**
 * Маршрутизация действий канала управления в facade записи.
 *
 * Любое исключение превращается в `Result`: демон отвечает ошибкой, а не рвёт соединение.
 */
export class ControlActionRouter {
  constructor(private readonly deps: { recorder: RecorderControlPort; log: Logger }) {}

  async route(action: ControlAction): Promise<Result<unknown>> {
    try {
      return await this.dispatch(action);
    } catch (e) {
      const dto = toAppErrorDto(e, { code: APP_ERROR.INTERNAL, message: "Внутренняя ошибка демона записи" });
      this.deps.log.error("действие завершилось исключением", { kind: action.kind, cause: dto.cause });
      return err(dto);
    }
  }

  private async dispatch(action: ControlAction): Promise<Result<unknown>> {
    const r = this.deps.recorder;
    switch (action.kind) {
      case "recorder.requestPermission":
        return ok(await r.requestPermission());
      case "recorder.start":
        return await r.startResult();
      case "recorder.stop":
        return await r.stopResult();
      case "recorder.isActive":
        return ok(r.isActive());
      case "recorder.status":
        return ok(r.getStatus());
      case "recorder.listFiles":
        return ok(await r.listFiles());
      case "recorder.gesture":
        return ok(await r.handleGesture(action.action));
      default: {
        const unreachable: never = action;
        return err({ code: APP_ERROR.VALIDATION, message: "Неизвестное действие", cause: JSON.stringify(unreachable) });
      }
    }
  }
}

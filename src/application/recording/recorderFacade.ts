import type { RecorderStatus, RecordingFileInfo } from "../../types";
import { toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";
import { err, ok, type Result } from "../../shared/result";
import type { ListRecordingsUseCase } from "../recordings/listRecordingsUseCase";
import type { GestureOutcome, GestureUseCase } from "./gestureUseCase";
import type { RecordingSessionUseCase } from "./recordingSessionUseCase";

/**
 * Application facade записи: тот интерфейс, который видит UI (CLI через канал управления).
 *
 * Собирает сессию, список файлов и вход жестов; `*Result` служат границей для presentation,
 * где исключения превращаются в `Result`.
 */
export class RecorderFacade {
  constructor(
    private readonly deps: {
      session: RecordingSessionUseCase;
      recordings: ListRecordingsUseCase;
      gesture: GestureUseCase;
    },
  ) {}

  async requestPermission(): Promise<boolean> {
    return await this.deps.session.requestPermission();
  }

  async start(): Promise<string> {
    return await this.deps.session.start();
  }

  async stop(): Promise<string> {
    return await this.deps.session.stop();
  }

  isActive(): boolean {
    return this.deps.session.isActive();
  }

  getStatus(): RecorderStatus {
    return this.deps.session.getStatus();
  }

  async listFiles(): Promise<RecordingFileInfo[]> {
    return await this.deps.recordings.execute();
  }

  async handleGesture(action: string | null | undefined): Promise<GestureOutcome> {
    return await this.deps.gesture.handle(action);
  }

  async startResult(): Promise<Result<string>> {
    try {
      return ok(await this.start());
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.RECORDING_CONFIG, message: "Не удалось начать запись. Подробности в логе." }));
    }
  }

  async stopResult(): Promise<Result<string>> {
    try {
      return ok(await this.stop());
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.RECORDING_BACKEND, message: "Не удалось остановить запись. Подробности в логе." }));
    }
  }
}

import type { FileNameTimeZone, Logger, RecorderStatus } from "../../types";
import type { CaptureInput } from "../../domain/policies/captureInput";
import { nextRecordingFileName } from "../../domain/policies/recordingFileNaming";
import { AppError, isAppError, toAppErrorDto } from "../../shared/appError";
import { APP_ERROR } from "../../shared/appErrorCodes";
import type { Result } from "../../shared/result";
import { SerialQueue } from "../../shared/serialQueue";

/** Что возвращает `stop()`, когда записывать было нечего. */
export const IDLE_SENTINEL = "idle";

const MAX_FILE_NAME_ATTEMPTS = 60;

/** Настроенный маршрут звука: какие входы пробовать для захвата. */
export type AudioRoute = { inputs: CaptureInput[] };

export type AudioSessionPort = {
  /** Подготовить захват (проверить инструменты, выбрать вход). Кидает, если записывать нечем. */
  configure(): Promise<AudioRoute>;
  /** Освободить маршрут. Ошибка возвращается как `Result`, вызывающий её только логирует. */
  deactivate(): Promise<Result<void>>;
};

export type MicrophonePermissionPort = {
  request(): Promise<boolean>;
};

/** Активный захват: привязан к одному файлу на всё время жизни. */
export type CaptureHandle = {
  readonly fileName: string;
  readonly filePath: string;
  isRunning(): boolean;
  /** Остановить захват и дождаться финализации контейнера. */
  stop(): Promise<void>;
};

export type CaptureBackend = {
  open(params: { fileName: string; filePath: string; route: AudioRoute }): Promise<CaptureHandle>;
};

export type RecordingsStorePort = {
  /** Создать папку записей (если нет). */
  ensureDir(): Promise<void>;
  pathOf(fileName: string): string;
  exists(fileName: string): Promise<boolean>;
};

export type RecordingSessionDeps = {
  nowMs: () => number;
  fileNameTimeZone: () => FileNameTimeZone;
  permission: MicrophonePermissionPort;
  audioSession: AudioSessionPort;
  capture: CaptureBackend;
  store: RecordingsStorePort;
  log: Logger;
};

/**
 * Сессия записи: state machine Idle ⇄ Recording с не более чем одним захватом на процесс.
 *
 * Один инстанс на процесс (singleton в DI): его делят CLI-запросы и жесты.
 * Все переходы идут через `SerialQueue`, поэтому одновременные start/stop из разных
 * источников не открывают второй захват и не теряют файл.
 */
export class RecordingSessionUseCase {
  private handle: CaptureHandle | null = null;
  private lastFileName: string | null = null;
  private readonly queue = new SerialQueue();

  constructor(private readonly deps: RecordingSessionDeps) {}

  /** Отказ возвращается как `false`, не ошибка. Состояние сессии не меняется. */
  async requestPermission(): Promise<boolean> {
    try {
      return await this.deps.permission.request();
    } catch (e) {
      this.deps.log.warn("requestPermission: проверка доступа к микрофону упала, считаем отказом", { error: e });
      return false;
    }
  }

  isActive(): boolean {
    return this.handle?.isRunning() ?? false;
  }

  getStatus(): RecorderStatus {
    const h = this.handle;
    if (h && h.isRunning()) return { active: true, fileName: h.fileName };
    return { active: false, fileName: null };
  }

  /**
   * Начать запись и вернуть имя файла.
   *
   * Идемпотентно: если запись уже идёт, возвращает имя текущего файла.
   * Ошибка настройки/захвата → `AppError(E_RECORDING_CONFIG)`, сессия остаётся Idle.
   */
  async start(): Promise<string> {
    return await this.queue.run(() => this.startLocked());
  }

  /** Остановить запись и вернуть имя файла, либо `"idle"`, если запись не шла. Не кидает. */
  async stop(): Promise<string> {
    return await this.queue.run(() => this.stopLocked());
  }

  private async startLocked(): Promise<string> {
    const current = this.handle;
    if (current && current.isRunning()) {
      this.deps.log.info("start: запись уже идёт", { fileName: current.fileName });
      return current.fileName;
    }
    if (current) {
      // Захват умер сам (ffmpeg упал/устройство пропало): файл уже закрыт, маршрут освобождаем.
      this.deps.log.warn("start: предыдущий захват завершился без stop", { fileName: current.fileName });
      this.handle = null;
      await this.deactivateAudioSession();
    }

    let route: AudioRoute;
    try {
      route = await this.deps.audioSession.configure();
    } catch (e) {
      throw this.configError("Не удалось настроить аудио-сессию для записи", e);
    }

    try {
      await this.deps.store.ensureDir();
      const fileName = await this.allocateFileName();
      const filePath = this.deps.store.pathOf(fileName);
      const handle = await this.deps.capture.open({ fileName, filePath, route });
      this.handle = handle;
      this.deps.log.info("start: запись началась", { fileName, filePath });
      return fileName;
    } catch (e) {
      await this.deactivateAudioSession();
      throw this.configError("Не удалось начать запись", e);
    }
  }

  private async stopLocked(): Promise<string> {
    const h = this.handle;
    if (!h) return IDLE_SENTINEL;

    if (!h.isRunning()) {
      this.deps.log.warn("stop: захват уже завершился сам", { fileName: h.fileName });
      this.handle = null;
      await this.deactivateAudioSession();
      return IDLE_SENTINEL;
    }

    try {
      await h.stop();
    } catch (e) {
      // Хэндл всё равно снимаем: висящий захват хуже, чем недописанный хвост файла.
      this.deps.log.error("stop: ошибка остановки захвата", { fileName: h.fileName, error: e });
    } finally {
      this.handle = null;
    }

    await this.deactivateAudioSession();
    this.deps.log.info("stop: запись сохранена", { fileName: h.fileName, filePath: h.filePath });
    return h.fileName;
  }

  private async allocateFileName(): Promise<string> {
    const timeZone = this.deps.fileNameTimeZone();
    for (let i = 0; i < MAX_FILE_NAME_ATTEMPTS; i++) {
      const name = nextRecordingFileName({ nowMs: this.deps.nowMs(), timeZone, lastFileName: this.lastFileName });
      this.lastFileName = name;
      if (!(await this.deps.store.exists(name))) return name;
      this.deps.log.info("start: имя файла занято, берём следующую секунду", { fileName: name });
    }
    throw new Error(`не удалось подобрать свободное имя файла за ${MAX_FILE_NAME_ATTEMPTS} попыток`);
  }

  private async deactivateAudioSession(): Promise<void> {
    let r: Result<void>;
    try {
      r = await this.deps.audioSession.deactivate();
    } catch (e) {
      r = { ok: false, error: toAppErrorDto(e, { code: APP_ERROR.RECORDING_BACKEND, message: "deactivate упал" }) };
    }
    if (!r.ok) {
      // Запись при этом сохранена: наружу не пробрасываем.
      this.deps.log.warn("аудио-сессия не деактивирована", { code: r.error.code, message: r.error.message, cause: r.error.cause });
    }
  }

  private configError(message: string, e: unknown): AppError {
    const dto = toAppErrorDto(e, { code: APP_ERROR.RECORDING_CONFIG, message });
    const reason = isAppError(e) ? e.dto.message : e instanceof Error ? e.message : String(e ?? "");
    const text = reason && reason !== message ? `${message}: ${reason}` : message;
    this.deps.log.error(text, { cause: dto.cause });
    return new AppError({ code: APP_ERROR.RECORDING_CONFIG, message: text, cause: dto.cause });
  }
}

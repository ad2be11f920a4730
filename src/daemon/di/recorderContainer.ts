import "reflect-metadata";
import { container, instanceCachingFactory, type DependencyContainer } from "tsyringe";

import type { RecorderSettings } from "../../types";
import type { MutableRef } from "../../shared/mutableRef";
import type { LogService } from "../../log/logService";
import type { RecorderPaths } from "../recorderPaths";
import { resolveRecordingsDir } from "../recorderPaths";
import {
  RecordingSessionUseCase,
  type AudioSessionPort,
  type CaptureBackend,
} from "../../application/recording/recordingSessionUseCase";
import { GestureUseCase } from "../../application/recording/gestureUseCase";
import { RecorderFacade } from "../../application/recording/recorderFacade";
import { ListRecordingsUseCase } from "../../application/recordings/listRecordingsUseCase";
import { RecordingsRepository } from "../../recording/recordingsRepository";
import { FfmpegAudioSession } from "../../recording/audioSession";
import { MicrophonePermission } from "../../recording/microphonePermission";
import { FfmpegCaptureBackend } from "../../recording/backends/ffmpegCaptureBackend";
import { ControlActionRouter } from "../../control/controlActionRouter";
import { ControlServer } from "../../control/controlServer";

/** Токены портов записи: их можно перерегистрировать поверх стандартных ffmpeg-реализаций. */
export const RECORDER_TOKENS = {
  audioSession: "recorder.audioSession",
  captureBackend: "recorder.captureBackend",
} as const;

/**
 * Tsyringe container демона (child container на процесс).
 *
 * DI без декораторов/emitDecoratorMetadata: все зависимости регистрируем явно через `useFactory`.
 * Сессия записи одна на процесс: её делят CLI-запросы и жесты.
 */
export function createRecorderContainer(params: {
  settingsRef: MutableRef<RecorderSettings>;
  paths: RecorderPaths;
  logService: LogService;
}): DependencyContainer {
  const c = container.createChildContainer();

  c.register<MutableRef<RecorderSettings>>("recorder.settingsRef", { useValue: params.settingsRef });
  c.register<RecorderPaths>("recorder.paths", { useValue: params.paths });
  c.register<LogService>("recorder.logService", { useValue: params.logService });
  c.register<() => number>("clock.nowMs", { useValue: () => Date.now() });

  const settings = () => c.resolve<MutableRef<RecorderSettings>>("recorder.settingsRef").get();
  const log = (scope: string) => c.resolve<LogService>("recorder.logService").scoped(scope);

  c.register(RecordingsRepository, {
    useFactory: instanceCachingFactory(
      (cc) =>
        new RecordingsRepository({
          getDir: () => resolveRecordingsDir(settings(), cc.resolve<RecorderPaths>("recorder.paths")),
          log: log("Записи"),
        }),
    ),
  });

  // Аудио-сессия держит выбранный маршрут между configure() и deactivate(): один инстанс.
  c.register<AudioSessionPort>(RECORDER_TOKENS.audioSession, {
    useFactory: instanceCachingFactory(() => new FfmpegAudioSession({ getSettings: () => settings().recording, log: log("Аудио-сессия") })),
  });

  c.register(MicrophonePermission, {
    useFactory: () => new MicrophonePermission({ getSettings: () => settings().recording, log: log("Микрофон") }),
  });

  c.register<CaptureBackend>(RECORDER_TOKENS.captureBackend, {
    useFactory: () => new FfmpegCaptureBackend({ ffmpegPath: () => settings().recording.ffmpegPath, log: log("ffmpeg") }),
  });

  c.register(RecordingSessionUseCase, {
    useFactory: instanceCachingFactory(
      (cc) =>
        new RecordingSessionUseCase({
          nowMs: cc.resolve<() => number>("clock.nowMs"),
          fileNameTimeZone: () => settings().recording.fileNameTimeZone,
          permission: cc.resolve(MicrophonePermission),
          audioSession: cc.resolve<AudioSessionPort>(RECORDER_TOKENS.audioSession),
          capture: cc.resolve<CaptureBackend>(RECORDER_TOKENS.captureBackend),
          store: cc.resolve(RecordingsRepository),
          log: log("Запись"),
        }),
    ),
  });

  c.register(ListRecordingsUseCase, {
    useFactory: (cc) => new ListRecordingsUseCase({ repository: cc.resolve(RecordingsRepository), log: log("Записи") }),
  });

  c.register(GestureUseCase, {
    useFactory: (cc) => new GestureUseCase({ session: cc.resolve(RecordingSessionUseCase), log: log("Жест") }),
  });

  c.register(RecorderFacade, {
    useFactory: (cc) =>
      new RecorderFacade({
        session: cc.resolve(RecordingSessionUseCase),
        recordings: cc.resolve(ListRecordingsUseCase),
        gesture: cc.resolve(GestureUseCase),
      }),
  });

  c.register(ControlActionRouter, {
    useFactory: (cc) => new ControlActionRouter({ recorder: cc.resolve(RecorderFacade), log: log("Канал управления") }),
  });

  c.register(ControlServer, {
    useFactory: instanceCachingFactory((cc) => {
      const router = cc.resolve(ControlActionRouter);
      return new ControlServer({
        settings: settings().control,
        handle: (action) => router.route(action),
        log: log("Канал управления"),
      });
    }),
  });

  return c;
}

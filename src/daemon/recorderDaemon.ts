import type { DependencyContainer } from "tsyringe";

import type { RecorderSettings } from "../types";
import { LogFileWriter, formatLogLine } from "../log/logFileWriter";
import { LogService } from "../log/logService";
import { DEFAULT_SETTINGS, readSettingsFile } from "../settingsStore";
import { createMutableRef, type MutableRef } from "../shared/mutableRef";
import { IDLE_SENTINEL, RecordingSessionUseCase } from "../application/recording/recordingSessionUseCase";
import { ControlServer } from "../control/controlServer";
import { createRecorderContainer } from "./di/recorderContainer";
import type { RecorderPaths } from "./recorderPaths";

/**
 * Composition root демона записи: настройки, лог, DI container и канал управления.
 */
export type RecorderDaemon = {
  container: DependencyContainer;
  logService: LogService;
  url: string;
  /** Перечитать `settings.json` и применить к логу (путь/устройство записи читаются на каждом старте). */
  reloadSettings: () => Promise<void>;
  /** Остановить активную запись, закрыть канал и дописать лог. */
  shutdown: () => Promise<void>;
};

export async function startRecorderDaemon(params: {
  paths: RecorderPaths;
  writeStderr?: (line: string) => void;
  /** Дополнительные регистрации поверх стандартных (другие бэкенды захвата, тесты). */
  register?: (container: DependencyContainer) => void;
}): Promise<RecorderDaemon> {
  const { paths } = params;
  const writeStderr = params.writeStderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  const initial = await readSettingsFile(paths.settingsFilePath);
  const settingsRef: MutableRef<RecorderSettings> = createMutableRef(initial.ok ? initial.value : DEFAULT_SETTINGS);
  const settings = settingsRef.get();

  const logFileWriter = new LogFileWriter({ logsDirPath: paths.logsDirPath, retentionDays: settings.log.retentionDays });
  const logService = new LogService(settings.log.maxEntries, {
    onEntry: (entry) => logFileWriter.enqueue(entry),
    homeDir: paths.homeDir,
  });

  let debugSink: (() => void) | null = null;
  const applyDebug = (enabled: boolean) => {
    if (enabled && !debugSink) debugSink = logService.addSink((entry) => writeStderr(formatLogLine(entry)));
    if (!enabled && debugSink) {
      debugSink();
      debugSink = null;
    }
  };
  applyDebug(settings.debug.enabled);

  const log = logService.scoped("Демон");
  if (!initial.ok) {
    log.warn("настройки не прочитаны, используем значения по умолчанию", {
      code: initial.error.code,
      message: initial.error.message,
      cause: initial.error.cause,
    });
  }
  await logFileWriter.cleanupOldLogFiles();

  const container = createRecorderContainer({ settingsRef, paths, logService });
  params.register?.(container);
  const server = container.resolve(ControlServer);
  let url: string;
  try {
    url = await server.listen();
  } catch (e) {
    log.error("канал управления не запущен (порт занят?)", { port: settings.control.port, error: String(e ?? "") });
    await logFileWriter.close();
    throw e;
  }
  log.info("демон записи запущен", { url, settingsFile: paths.settingsFilePath });

  const reloadSettings = async () => {
    const r = await readSettingsFile(paths.settingsFilePath);
    if (!r.ok) {
      log.warn("настройки не перечитаны", { code: r.error.code, message: r.error.message, cause: r.error.cause });
      return;
    }
    settingsRef.set(r.value);
    logService.setMaxEntries(r.value.log.maxEntries);
    await logFileWriter.setRetentionDays(r.value.log.retentionDays);
    applyDebug(r.value.debug.enabled);
    // Адрес канала управления меняется только перезапуском демона.
    log.info("настройки перечитаны");
  };

  let shuttingDown: Promise<void> | null = null;
  const shutdown = async () => {
    if (shuttingDown) return await shuttingDown;
    shuttingDown = (async () => {
      // stop() встаёт в очередь сессии за ещё не завершённым start(): его захват тоже будет остановлен.
      const session = container.resolve(RecordingSessionUseCase);
      try {
        const fileName = await session.stop();
        if (fileName !== IDLE_SENTINEL) log.info("запись остановлена при завершении демона", { fileName });
      } catch (e) {
        log.error("не удалось остановить запись при завершении", { error: String(e ?? "") });
      }
      await server.close();
      log.info("демон записи остановлен");
      applyDebug(false);
      await logFileWriter.close();
    })();
    return await shuttingDown;
  };

  return { container, logService, url, reloadSettings, shutdown };
}

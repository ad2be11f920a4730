import "reflect-metadata";
import * as fs from "node:fs/promises";

import { resolveRecorderPaths } from "./src/daemon/recorderPaths";
import { startRecorderDaemon } from "./src/daemon/recorderDaemon";
import { ControlClient } from "./src/control/controlClient";
import { CLI_USAGE, parseCliArgs } from "./src/presentation/cli/cliArgs";
import { EXIT_CODE, runClientCommand, type CliIo } from "./src/presentation/cli/cliRunner";
import { formatAppError } from "./src/presentation/cli/formatters";
import { DEFAULT_SETTINGS, readSettingsFile, writeSettingsFile } from "./src/settingsStore";

/**
 * Точка входа `stealth-recorder`.
 *
 * `daemon` держит сессию записи и канал управления; остальные команды являются клиентами этого демона
 * (в том числе `open-url stealthrecorder://start`, который запускает ярлык/жест ОС).
 */
const io: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

async function runDaemon(): Promise<number> {
  const paths = resolveRecorderPaths();
  const daemon = await startRecorderDaemon({ paths });
  io.out(`Демон записи слушает ${daemon.url}`);

  return await new Promise<number>((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      daemon.logService.info("получен сигнал завершения", { signal });
      daemon
        .shutdown()
        .then(() => resolve(EXIT_CODE.OK))
        .catch((e: unknown) => {
          io.err(`Ошибка при завершении демона: ${String(e)}`);
          resolve(EXIT_CODE.ERROR);
        });
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
    process.on("SIGHUP", () => {
      daemon.reloadSettings().catch((e: unknown) => daemon.logService.error("перечитывание настроек упало", { error: String(e) }));
    });
  });
}

async function initConfig(): Promise<number> {
  const paths = resolveRecorderPaths();
  try {
    await fs.access(paths.settingsFilePath);
    io.out(`Файл настроек уже есть: ${paths.settingsFilePath}`);
    return EXIT_CODE.OK;
  } catch {
    await writeSettingsFile(paths.settingsFilePath, DEFAULT_SETTINGS);
    io.out(`Создан файл настроек: ${paths.settingsFilePath}`);
    return EXIT_CODE.OK;
  }
}

async function main(argv: string[]): Promise<number> {
  const verbose = argv.includes("--verbose");
  const parsed = parseCliArgs(argv.filter((a) => a !== "--verbose"));
  if (!parsed.ok) {
    io.err(parsed.message);
    io.err(CLI_USAGE);
    return EXIT_CODE.USAGE;
  }

  const command = parsed.command;
  switch (command.kind) {
    case "help":
      io.out(CLI_USAGE);
      return EXIT_CODE.OK;
    case "daemon":
      return await runDaemon();
    case "init-config":
      return await initConfig();
    default: {
      const paths = resolveRecorderPaths();
      const settings = await readSettingsFile(paths.settingsFilePath);
      if (!settings.ok) {
        io.err(formatAppError(settings.error, { withCause: verbose }));
        return EXIT_CODE.ERROR;
      }
      const client = new ControlClient({ settings: settings.value.control });
      return await runClientCommand(command, { request: (action) => client.request(action), io, verbose });
    }
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    io.err(`Непредвиденная ошибка: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}`);
    process.exitCode = EXIT_CODE.ERROR;
  });

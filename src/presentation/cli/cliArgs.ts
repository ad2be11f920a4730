import { parseGestureUrl } from "../../domain/policies/gestureAction";

export type CliCommand =
  | { kind: "daemon" }
  | { kind: "status" }
  | { kind: "start" }
  | { kind: "stop" }
  | { kind: "list" }
  | { kind: "permission" }
  | { kind: "init-config" }
  | { kind: "gesture"; action: string }
  | { kind: "help" };

export type CliParseResult = { ok: true; command: CliCommand } | { ok: false; message: string };

export const CLI_USAGE = [
  "Использование: stealth-recorder <команда>",
  "",
  "  daemon                 запустить демон записи (держит сессию)",
  "  status                 идёт ли запись и в какой файл",
  "  start                  начать запись",
  "  stop                   остановить запись",
  "  list                   сохранённые записи, последние сверху",
  "  permission             запросить доступ к микрофону",
  "  gesture <start|stop>   то же, что жест ОС",
  "  open-url <url>         обработать stealthrecorder://start|stop",
  "  init-config            создать settings.json со значениями по умолчанию",
  "  help                   эта справка",
].join("\n");

type SimpleKind = Exclude<CliCommand["kind"], "gesture">;

function simpleKind(v: string): SimpleKind | null {
  switch (v) {
    case "daemon":
    case "status":
    case "start":
    case "stop":
    case "list":
    case "permission":
    case "init-config":
    case "help":
      return v;
    default:
      return null;
  }
}

/** Разбор argv (без `node` и имени скрипта). */
export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const [rawCmd, ...rest] = argv;
  const cmd = String(rawCmd ?? "").trim().toLowerCase();
  if (!cmd || cmd === "--help" || cmd === "-h") return { ok: true, command: { kind: "help" } };

  const simple = simpleKind(cmd);
  if (simple) {
    if (rest.length > 0) return { ok: false, message: `Команда ${simple} не принимает аргументов` };
    return { ok: true, command: { kind: simple } };
  }

  if (cmd === "gesture") {
    if (rest.length !== 1) return { ok: false, message: "Ожидается: gesture <start|stop>" };
    // Неизвестное действие отдаём демону как есть: там оно логируется и игнорируется.
    return { ok: true, command: { kind: "gesture", action: rest[0] ?? "" } };
  }

  if (cmd === "open-url") {
    if (rest.length !== 1) return { ok: false, message: "Ожидается: open-url <url>" };
    const action = parseGestureUrl(rest[0] ?? "");
    if (action === null) return { ok: false, message: `Не ссылка stealthrecorder://: ${rest[0] ?? ""}` };
    return { ok: true, command: { kind: "gesture", action } };
  }

  return { ok: false, message: `Неизвестная команда: ${rawCmd ?? ""}` };
}

import { execFile } from "node:child_process";

/** Есть ли исполняемый файл `cmd` в PATH (или по указанному пути). */
export async function commandExists(cmd: string): Promise<boolean> {
  if (!cmd) return false;

  if (process.platform === "win32") {
    return await new Promise<boolean>((resolve) => {
      execFile("where", [cmd], { timeout: 2000, windowsHide: true }, (err) => resolve(!err));
    });
  }

  return await new Promise<boolean>((resolve) => {
    execFile("sh", ["-lc", `command -v ${shellEscape(cmd)} >/dev/null 2>&1`], { timeout: 2000 }, (err) => {
      resolve(!err);
    });
  });
}

export type ExecTextResult = { ok: boolean; stdout: string; stderr: string };

/** Запустить команду без shell и собрать stdout/stderr; ошибка запуска → `ok: false`, не исключение. */
export async function execText(file: string, args: string[], timeoutMs = 2000): Promise<ExecTextResult> {
  return await new Promise((resolve) => {
    execFile(file, args, { timeout: timeoutMs, windowsHide: true }, (err, stdout, stderr) => {
      resolve({ ok: !err, stdout: String(stdout ?? ""), stderr: String(stderr ?? "") });
    });
  });
}

function shellEscape(s: string): string {
  return `'${String(s).replace(/'/g, `'\"'\"'`)}'`;
}

import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { Logger, RecordingFileInfo } from "../types";
import type { RecordingsStorePort } from "../application/recording/recordingSessionUseCase";
import type { RecordingsRepositoryPort } from "../application/recordings/listRecordingsUseCase";
import { isRecordingFile } from "../domain/policies/recordingFileFilter";
import { toAppErrorDto } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";

/**
 * Папка записей на диске: создание, проверка имени и список `.m4a` с размером и датой.
 *
 * Папка читается через `getDir()` на каждый вызов: путь может смениться после перечитывания настроек.
 */
export class RecordingsRepository implements RecordingsStorePort, RecordingsRepositoryPort {
  constructor(private readonly params: { getDir: () => string; log: Logger }) {}

  private get dir(): string {
    return this.params.getDir();
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
  }

  pathOf(fileName: string): string {
    return path.join(this.dir, fileName);
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      await fs.access(this.pathOf(fileName));
      return true;
    } catch {
      return false;
    }
  }

  async list(): Promise<Result<RecordingFileInfo[]>> {
    const dir = this.dir;
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.FS_IO, message: "Не удалось прочитать папку записей", details: { dir } }));
    }

    const out: RecordingFileInfo[] = [];
    for (const name of names) {
      if (!isRecordingFile(name)) continue;
      const filePath = path.join(dir, name);
      try {
        const st = await fs.stat(filePath);
        if (!st.isFile()) continue;
        // birthtime = 0, если ФС не хранит время создания.
        const createdMs = st.birthtimeMs > 0 ? st.birthtimeMs : st.mtimeMs;
        out.push({ name, path: filePath, size: st.size, date: new Date(createdMs).toISOString() });
      } catch (e) {
        this.params.log.warn("stat записи не удался, пропускаем", { name, error: String(e ?? "") });
      }
    }
    return ok(out);
  }
}

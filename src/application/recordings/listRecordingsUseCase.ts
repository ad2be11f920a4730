import type { Logger, RecordingFileInfo } from "../../types";
import { sortRecordingsNewestFirst } from "../../domain/policies/sortRecordingsNewestFirst";
import type { Result } from "../../shared/result";

export type RecordingsRepositoryPort = {
  /** Все записи в папке (порядок не гарантирован). */
  list(): Promise<Result<RecordingFileInfo[]>>;
};

/**
 * Список сохранённых записей для UI: последние сверху.
 *
 * Никогда не падает: ошибка чтения папки логируется и превращается в пустой список.
 */
export class ListRecordingsUseCase {
  constructor(private readonly deps: { repository: RecordingsRepositoryPort; log: Logger }) {}

  async execute(): Promise<RecordingFileInfo[]> {
    const r = await this.deps.repository.list();
    if (!r.ok) {
      this.deps.log.warn("не удалось прочитать папку записей", { code: r.error.code, message: r.error.message, cause: r.error.cause });
      return [];
    }
    const sorted = sortRecordingsNewestFirst(r.value);
    this.deps.log.info("найдено записей", { count: sorted.length });
    return sorted;
  }
}

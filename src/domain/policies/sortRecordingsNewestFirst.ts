/**
 * Policy: сортировка списка записей "последние сверху".
 *
 * Сравниваем по времени, а не по строке даты; при равных датах по имени (тоже по убыванию),
 * чтобы порядок был детерминированным. Невалидные даты уходят в конец.
 */
export function sortRecordingsNewestFirst<T extends { name: string; date: string }>(items: T[]): T[] {
  const out = [...items];
  out.sort((a, b) => {
    const at = Date.parse(a.date);
    const bt = Date.parse(b.date);
    const aBad = Number.isNaN(at);
    const bBad = Number.isNaN(bt);
    if (aBad !== bBad) return aBad ? 1 : -1;
    if (!aBad && !bBad && at !== bt) return bt - at;
    return a.name < b.name ? 1 : a.name > b.name ? -1 : 0;
  });
  return out;
}

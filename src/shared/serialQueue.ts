/**
 * Последовательная очередь async-задач (мьютекс на цепочке промисов).
 *
 * Следующая задача стартует только после завершения предыдущей, успешного или нет:
 * ошибка задачи уходит её вызывающему и не ломает очередь.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const p = this.tail.then(task);
    this.tail = p.then(
      () => undefined,
      () => undefined,
    );
    return p;
  }
}

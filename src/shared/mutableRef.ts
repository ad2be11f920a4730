/** Изменяемая ссылка на значение, которое переживает пересоздание зависимых сервисов (например, настройки). */
export type MutableRef<T> = {
  get: () => T;
  set: (next: T) => void;
};

export function createMutableRef<T>(initial: T): MutableRef<T> {
  let current = initial;
  return {
    get: () => current,
    set: (next) => {
      current = next;
    },
  };
}

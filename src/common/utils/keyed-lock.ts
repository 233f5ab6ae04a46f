/**
 * Exclusión mutua por clave: las tareas con la misma clave se ejecutan en
 * orden de llegada, las de claves distintas nunca esperan entre sí.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task, task);
    // La cola no debe romperse si una tarea falla
    const tail = current.catch(() => undefined);
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return current;
  }

  isBusy(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Single-resolution completion shared by several producers
 *
 * The first call to resolve() or reject() settles the promise; every later
 * call is ignored and reports false. Used where an HTTP handler, a server
 * error listener and an abort signal all race to end the same wait.
 */
export class FirstResult<T> {
  private resolvePromise: (value: T) => void = () => {};
  private rejectPromise: (error: unknown) => void = () => {};
  private done = false;

  readonly promise: Promise<T> = new Promise<T>((resolve, reject) => {
    this.resolvePromise = resolve;
    this.rejectPromise = reject;
  });

  get settled(): boolean {
    return this.done;
  }

  resolve(value: T): boolean {
    if (this.done) return false;
    this.done = true;
    this.resolvePromise(value);
    return true;
  }

  reject(error: unknown): boolean {
    if (this.done) return false;
    this.done = true;
    this.rejectPromise(error);
    return true;
  }
}

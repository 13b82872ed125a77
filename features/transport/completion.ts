/**
 * One-shot completion handle bridging callback/event APIs into a promise.
 *
 * The first `resolve` or `reject` wins; later attempts return false and do
 * nothing, so racing callbacks cannot fulfil the promise twice.
 */
export class Completion<T> {
  readonly promise: Promise<T>;
  private settled = false;
  private readonly resolveFn: (value: T) => void;
  private readonly rejectFn: (error: Error) => void;

  constructor() {
    let resolveFn: (value: T) => void = () => {};
    let rejectFn: (error: Error) => void = () => {};
    this.promise = new Promise<T>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this.resolveFn = resolveFn;
    this.rejectFn = rejectFn;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  resolve(value: T): boolean {
    if (this.settled) return false;
    this.settled = true;
    this.resolveFn(value);
    return true;
  }

  reject(error: Error): boolean {
    if (this.settled) return false;
    this.settled = true;
    this.rejectFn(error);
    return true;
  }
}

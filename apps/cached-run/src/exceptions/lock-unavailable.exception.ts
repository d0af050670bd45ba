export class LockUnavailableException extends Error {
  constructor(readonly lockPath: string, reason: string) {
    super(`Cannot lock ${lockPath}: ${reason}`);
    this.name = 'LockUnavailableException';
    Object.setPrototypeOf(this, LockUnavailableException.prototype);
  }
}

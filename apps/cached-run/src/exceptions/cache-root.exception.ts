export class CacheRootException extends Error {
  constructor(readonly root: string, reason: string) {
    super(`Cache directory ${root} is unusable: ${reason}`);
    this.name = 'CacheRootException';
    Object.setPrototypeOf(this, CacheRootException.prototype);
  }
}

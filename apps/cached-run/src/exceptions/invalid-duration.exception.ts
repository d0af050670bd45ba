import { ConfigurationException } from './configuration.exception';

export class InvalidDurationException extends ConfigurationException {
  constructor(readonly input: string, token: string) {
    super(`Invalid duration: '${input}' (token: ${token || '<empty>'}). Expected e.g. 30s, 5m, 1h30m or 2d.`);
    this.name = 'InvalidDurationException';
    Object.setPrototypeOf(this, InvalidDurationException.prototype);
  }
}

export class ConfigurationException extends Error {
  constructor(message = 'Invalid cache configuration.') {
    super(message);
    this.name = 'ConfigurationException';
    Object.setPrototypeOf(this, ConfigurationException.prototype);
  }
}

export class InterruptedError extends Error {
  constructor(message = 'Run interrupted') {
    super(message);
    this.name = 'InterruptedError';
  }
}

export class ConnectionClosedError extends Error {
  constructor(message = 'Connection closed') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} exceeded its ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export class DispatcherClosedError extends Error {
  constructor() {
    super('Broadcast dispatcher is closed');
    this.name = 'DispatcherClosedError';
  }
}

export class RegistryReentrancyError extends Error {
  constructor(operation: string) {
    super(`Connection registry ${operation} called while the registry is locked`);
    this.name = 'RegistryReentrancyError';
  }
}

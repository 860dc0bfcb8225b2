export class ConfigError extends Error {
  constructor(message: string, readonly errs: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

export class RpcError extends Error {
  constructor(message: string, readonly code?: number) {
    super(message);
    this.name = 'RpcError';
  }
}

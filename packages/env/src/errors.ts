export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MissingCredentialError extends Error {
  constructor(public readonly variable: string) {
    super(
      `${variable} not found. Set CAUDENA_KID and CAUDENA_SECRET as environment variables, ` +
        'or in a .env or .env.local file in the current directory.'
    );
    this.name = 'MissingCredentialError';
  }
}

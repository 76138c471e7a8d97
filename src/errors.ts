export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The push provider reported that the endpoint no longer exists (HTTP 404/410). */
export class PushSubscriptionGoneError extends Error {
  constructor(
    readonly endpoint: string,
    readonly statusCode: number
  ) {
    super(`Push endpoint is gone (status ${statusCode})`);
    this.name = 'PushSubscriptionGoneError';
  }
}

export class ChannelTimeoutError extends Error {
  constructor(
    readonly channel: string,
    readonly timeoutMs: number
  ) {
    super(`${channel} delivery timed out after ${timeoutMs}ms`);
    this.name = 'ChannelTimeoutError';
  }
}

export async function withTimeout<T>(channel: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new ChannelTimeoutError(channel, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

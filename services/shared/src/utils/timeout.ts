export class TimeoutError extends Error {
     constructor(
          public readonly label: string,
          public readonly timeoutMs: number
     ) {
          super(`${label} timed out after ${timeoutMs}ms`);
          this.name = 'TimeoutError';
     }
}

/**
 * Races `promise` against a timer. The timer is always cleared, so a settled
 * call leaves nothing pending on the event loop.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
     let timer: NodeJS.Timeout | undefined;

     const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
     });

     try {
          return await Promise.race([promise, timeout]);
     } finally {
          clearTimeout(timer);
     }
}

export interface FormattedError {
  name: string;
  message: string;
  stack?: string;
  cause?: FormattedError;
}

export function formatError(error: unknown): FormattedError {
  if (error instanceof Error) {
    const formatted: FormattedError = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if (error.cause !== undefined) {
      formatted.cause = formatError(error.cause);
    }
    return formatted;
  }
  return { name: typeof error, message: errorMessage(error) };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null) {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }
  return String(error);
}

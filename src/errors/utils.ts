/**
 * Message of anything that can be thrown or handed to `fail()`.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch (serializationError) {
    return `Unserializable value (${errorMessage(serializationError)})`;
  }
}

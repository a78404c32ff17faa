/**
 * Extracts a string message from an unknown error value.
 * Handles both Error instances and arbitrary thrown values.
 *
 * @param error - The caught error value (Error instance or any thrown value)
 * @returns The error message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Joins the message of an error with the messages of its `cause` chain,
 * outermost first: `failed to send message: connection refused`.
 */
export function formatErrorChain(error: unknown): string {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const message = getErrorMessage(current);
    if (message && !messages.includes(message)) {
      messages.push(message);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return messages.join(': ');
}

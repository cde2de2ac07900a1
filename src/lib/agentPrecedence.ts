function present(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * The agent recorded on the call row always wins; the query-string agent is
 * only a fallback for calls without one (or without a row at all).
 */
export function resolveAgentName(callAgent: string | null | undefined, queryAgent: string | null | undefined): string | null {
  return present(callAgent) ?? present(queryAgent);
}

import type { InferenceClient } from './client';

/**
 * Pick a model from an ordered preference list.
 *
 * Preferences are substrings (e.g. "sonnet"); the first preference with any
 * available model containing it wins, and among those the first available
 * model in the service's order. Returns null when nothing matches.
 */
export function selectModel(
  preferences: readonly string[],
  available: readonly string[]
): string | null {
  for (const preference of preferences) {
    const needle = preference.toLowerCase();
    const match = available.find(model => model.toLowerCase().includes(needle));
    if (match !== undefined) {
      return match;
    }
  }
  return null;
}

/**
 * Resolve the model to use with a client.
 * Clients that cannot list their models get the first preference as is.
 */
export async function resolveModel(
  client: InferenceClient,
  preferences: readonly string[]
): Promise<string | undefined> {
  if (!client.listModels) {
    return preferences[0];
  }
  const available = await client.listModels();
  return selectModel(preferences, available) ?? undefined;
}

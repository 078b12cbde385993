import { errorMessage } from "@/sync/errors";

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/** Run an async step and turn a thrown error into a failure value. */
export async function attempt<T>(step: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Play Command
 */

import { createPlayer } from '../lib/context.js';
import { fail } from '../lib/output.js';

export async function playCommand(file: string): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();

  process.on('SIGINT', onInterrupt);
  try {
    await createPlayer().play(file, { signal: controller.signal });
  } catch (error) {
    fail(error);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

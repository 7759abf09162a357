import * as readline from 'readline';
import { createLogger } from '../utils/logger';

const logger = createLogger('cli');

const FIRST_PROMPT = 'Enter item id to lookup: ';
const NEXT_PROMPT = 'Enter item id: ';

/**
 * Ask for item ids until an empty line or end of input, handing each id to
 * `onItemId` before asking again.
 */
export async function promptForItemIds(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  onItemId: (itemId: string) => Promise<void>,
): Promise<void> {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  // Resolves '' once input ends, so EOF stops the loop like an empty line.
  const question = (prompt: string): Promise<string> =>
    new Promise((resolve) => {
      if (closed) {
        resolve('');
        return;
      }
      const onClose = () => resolve('');
      rl.once('close', onClose);
      rl.question(prompt, (answer) => {
        rl.off('close', onClose);
        resolve(answer.trim());
      });
    });

  let count = 0;
  try {
    let itemId = await question(FIRST_PROMPT);
    while (itemId) {
      await onItemId(itemId);
      count++;
      itemId = await question(NEXT_PROMPT);
    }
  } finally {
    logger.debug({ count, endOfInput: closed }, 'Prompt finished');
    rl.close();
  }
}

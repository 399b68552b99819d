import { createInterface, type Interface } from 'node:readline';

export interface SelectOptions<T> {
  prompt: string;
  format: (item: T) => string;
}

/**
 * Interactive input for commands whose argument was left out. Both methods
 * resolve to `undefined` when the user cancels (blank answer or end of input).
 */
export interface Prompter {
  input(prompt: string): Promise<string | undefined>;
  select<T>(items: readonly T[], options: SelectOptions<T>): Promise<T | undefined>;
}

function ask(rl: Interface, prompt: string): Promise<string | undefined> {
  return new Promise((resolve) => {
    const onClose = () => resolve(undefined);
    rl.once('close', onClose);
    rl.question(prompt, (answer) => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

export function createReadlinePrompter(options: {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}): Prompter {
  const withInterface = async <T>(fn: (rl: Interface) => Promise<T>): Promise<T> => {
    const rl = createInterface({ input: options.input, output: options.output, terminal: false });
    try {
      return await fn(rl);
    } finally {
      rl.close();
    }
  };

  return {
    input: (prompt) =>
      withInterface(async (rl) => {
        const answer = (await ask(rl, prompt))?.trim();
        return answer ? answer : undefined;
      }),

    select: (items, { prompt, format }) =>
      withInterface(async (rl) => {
        items.forEach((item, index) => {
          options.output.write(`${String(index + 1).padStart(3)}) ${format(item)}\n`);
        });

        const answer = (await ask(rl, `${prompt} [1-${items.length}]: `))?.trim();
        if (!answer || !/^\d+$/.test(answer)) {
          return undefined;
        }
        return items[Number(answer) - 1];
      }),
  };
}

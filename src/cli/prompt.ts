import * as readline from 'readline';

export interface Prompter {
  /** Resolves with the typed line, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  const pending = new Set<(answer: string | null) => void>();
  let closed = false;

  rl.on('close', () => {
    closed = true;
    for (const resolve of pending) resolve(null);
    pending.clear();
  });

  return {
    ask(question: string) {
      if (closed) return Promise.resolve(null);
      return new Promise<string | null>((resolve) => {
        pending.add(resolve);
        rl.question(question, (answer) => {
          pending.delete(resolve);
          resolve(answer);
        });
      });
    },
    close() {
      rl.close();
    },
  };
}

export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(question);
  return (answer ?? '').trim().toLowerCase() === 'yes';
}

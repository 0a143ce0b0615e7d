import readline from 'node:readline/promises';

/**
 * Where interactive answers come from. `ask` resolves to null once input
 * has ended.
 */
export interface DecisionSource {
  ask(question: string): Promise<string | null>;
  close(): void;
}

export function createConsoleDecisionSource(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): DecisionSource {
  let rl: readline.Interface | null = null;
  let inputEnded = false;
  let closed = false;
  // Piped input can deliver several answers in one chunk
  const pendingLines: string[] = [];
  let waiting: ((line: string | null) => void) | null = null;

  const settle = (line: string | null): boolean => {
    if (!waiting) {
      return false;
    }
    const resolve = waiting;
    waiting = null;
    resolve(line);
    return true;
  };

  // Opened on first use so runs without prompts never hold stdin open
  const open = (): readline.Interface => {
    if (!rl) {
      const created = readline.createInterface({ input, output });
      created.on('line', (line) => {
        if (!settle(line)) {
          pendingLines.push(line);
        }
      });
      created.once('close', () => {
        inputEnded = true;
        settle(null);
      });
      rl = created;
    }
    return rl;
  };

  const ask = async (question: string): Promise<string | null> => {
    if (closed) {
      return null;
    }

    const iface = open();
    if (inputEnded) {
      const buffered = pendingLines.shift();
      if (buffered === undefined) {
        return null;
      }
      output.write(question);
      return buffered;
    }

    iface.setPrompt(question);
    iface.prompt();

    const buffered = pendingLines.shift();
    if (buffered !== undefined) {
      return buffered;
    }
    return new Promise<string | null>((resolve) => {
      waiting = resolve;
    });
  };

  const close = (): void => {
    closed = true;
    pendingLines.length = 0;
    if (rl && !inputEnded) {
      rl.close();
    }
    settle(null);
  };

  return { ask, close };
}

import readline from 'readline';

export interface Confirmer {
  confirm(question: string): Promise<boolean>;
}

export const alwaysConfirm: Confirmer = {
  async confirm() {
    return true;
  },
};

export function isAffirmative(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'Y';
}

/** Asks once on the given streams; end of input counts as "no". */
export function createTerminalConfirmer(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Confirmer {
  return {
    confirm(question) {
      return new Promise((resolve) => {
        const rl = readline.createInterface({ input, output, terminal: false });
        let answered = false;
        rl.on('close', () => {
          if (!answered) resolve(false);
        });
        output.write(question);
        rl.once('line', (line) => {
          answered = true;
          rl.close();
          resolve(isAffirmative(line));
        });
      });
    },
  };
}

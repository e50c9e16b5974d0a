import * as readline from "node:readline";

/** Ask a yes/no question; true only for an answer starting with y or Y. */
export type Confirm = (question: string) => Promise<boolean>;

export const YES = /^(y|Y)/;

export const askOnTerminal: Confirm = (question) => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(`[QUESTION] ${question} (y/N)? `, (answer) => {
      rl.close();
      resolve(YES.test(answer));
    });
  });
};

/** Every question must be answered yes; stops at the first no. */
export async function confirmAll(confirm: Confirm, questions: readonly string[]): Promise<boolean> {
  for (const q of questions) {
    if (!(await confirm(q))) return false;
  }
  return true;
}

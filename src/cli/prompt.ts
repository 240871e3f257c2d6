/**
 * Interactive collection of data file names.
 *
 * Used when the CLI is started without file arguments. Questions go
 * through an injected Prompter so tests can script the answers.
 */

/**
 * Line-oriented question/answer channel. `ask` resolves to undefined once
 * input has ended.
 */
export interface Prompter {
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

export const FILE_QUESTION = "Please enter the name of the file you wish to load:\n";
export const CONTINUE_QUESTION = "Is there another file you'd like to load? [y/n]\n";
export const INVALID_ANSWER = "Sorry, the value you inputted was not valid.\n";
export const EXIT_PROMPT = "Press Enter to exit...\n";

const YES_ANSWERS: ReadonlySet<string> = new Set(["yes", "y", "true", "1"]);
const NO_ANSWERS: ReadonlySet<string> = new Set(["no", "n", "false", "0"]);

/**
 * Interpret a yes/no answer, case-insensitively. Returns undefined for
 * anything that is neither.
 */
export function parseYesNo(answer: string): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (YES_ANSWERS.has(normalized)) {
    return true;
  }
  if (NO_ANSWERS.has(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Ask a yes/no question until the answer is valid. End of input counts
 * as "no".
 */
export async function askYesNo(prompter: Prompter, question: string): Promise<boolean> {
  let prompt = question;
  for (;;) {
    const answer = await prompter.ask(prompt);
    if (answer === undefined) {
      return false;
    }
    const parsed = parseYesNo(answer);
    if (parsed !== undefined) {
      return parsed;
    }
    prompt = INVALID_ANSWER + question;
  }
}

/**
 * Ask for file names one at a time until the user says there are no
 * more. Blank names are asked again. Returns the names in the order
 * given; the list is empty only if input ended before the first name.
 */
export async function promptForFiles(prompter: Prompter): Promise<string[]> {
  const files: string[] = [];
  for (;;) {
    const answer = await prompter.ask(FILE_QUESTION);
    if (answer === undefined) {
      return files;
    }
    const name = answer.trim();
    if (name.length === 0) {
      continue;
    }
    files.push(name);

    const another = await askYesNo(prompter, CONTINUE_QUESTION);
    if (!another) {
      return files;
    }
  }
}

/**
 * Wait for the user to acknowledge the results before the process exits.
 */
export async function waitForAcknowledgment(prompter: Prompter): Promise<void> {
  await prompter.ask(EXIT_PROMPT);
}

/**
 * Tests for interactive file-name collection.
 *
 * A scripted Prompter replays fixed answers and records every question.
 */

import { describe, it, expect } from "vitest";
import {
  parseYesNo,
  askYesNo,
  promptForFiles,
  waitForAcknowledgment,
  FILE_QUESTION,
  CONTINUE_QUESTION,
  INVALID_ANSWER,
  EXIT_PROMPT,
  type Prompter,
} from "./prompt.js";

function scriptedPrompter(answers: readonly string[]): Prompter & { questions: string[]; closed: boolean } {
  const queue = [...answers];
  const questions: string[] = [];
  return {
    questions,
    closed: false,
    async ask(question: string) {
      questions.push(question);
      return queue.shift();
    },
    close() {
      this.closed = true;
    },
  };
}

describe("parseYesNo", () => {
  it.each(["yes", "y", "true", "1", "YES", "Y", "True", " y "])("reads %j as yes", (answer) => {
    expect(parseYesNo(answer)).toBe(true);
  });

  it.each(["no", "n", "false", "0", "NO", "N", "False"])("reads %j as no", (answer) => {
    expect(parseYesNo(answer)).toBe(false);
  });

  it.each(["", "maybe", "yess", "2", "nope"])("rejects %j", (answer) => {
    expect(parseYesNo(answer)).toBeUndefined();
  });
});

describe("askYesNo", () => {
  it("re-asks after an invalid answer", async () => {
    const prompter = scriptedPrompter(["maybe", "later", "y"]);

    const answer = await askYesNo(prompter, CONTINUE_QUESTION);

    expect(answer).toBe(true);
    expect(prompter.questions).toEqual([
      CONTINUE_QUESTION,
      INVALID_ANSWER + CONTINUE_QUESTION,
      INVALID_ANSWER + CONTINUE_QUESTION,
    ]);
  });

  it("treats end of input as no", async () => {
    const prompter = scriptedPrompter(["what"]);
    expect(await askYesNo(prompter, CONTINUE_QUESTION)).toBe(false);
  });
});

describe("promptForFiles", () => {
  it("collects names until the user answers no", async () => {
    const prompter = scriptedPrompter(["run1.dat", "yes", "run2.dat", "n"]);

    const files = await promptForFiles(prompter);

    expect(files).toEqual(["run1.dat", "run2.dat"]);
    expect(prompter.questions).toEqual([
      FILE_QUESTION,
      CONTINUE_QUESTION,
      FILE_QUESTION,
      CONTINUE_QUESTION,
    ]);
  });

  it("asks again for a blank name", async () => {
    const prompter = scriptedPrompter(["   ", "run1.dat", "0"]);

    expect(await promptForFiles(prompter)).toEqual(["run1.dat"]);
    expect(prompter.questions[1]).toBe(FILE_QUESTION);
  });

  it("trims surrounding whitespace from names", async () => {
    const prompter = scriptedPrompter(["  run1.dat \n", "no"]);
    expect(await promptForFiles(prompter)).toEqual(["run1.dat"]);
  });

  it("returns what was collected when input ends", async () => {
    expect(await promptForFiles(scriptedPrompter([]))).toEqual([]);
    expect(await promptForFiles(scriptedPrompter(["a.dat", "y"]))).toEqual(["a.dat"]);
  });
});

describe("waitForAcknowledgment", () => {
  it("asks the exit prompt once", async () => {
    const prompter = scriptedPrompter([""]);
    await waitForAcknowledgment(prompter);
    expect(prompter.questions).toEqual([EXIT_PROMPT]);
  });
});

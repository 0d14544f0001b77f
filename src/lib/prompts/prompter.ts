import { confirm, input, select } from '@inquirer/prompts';

export interface PromptChoice<T extends string> {
  name: string;
  value: T;
}

/**
 * Operator interaction used by the setup steps. Keeps step logic independent
 * of the terminal so runs can be scripted.
 */
export interface Prompter {
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  choose<T extends string>(
    message: string,
    choices: PromptChoice<T>[],
    defaultValue?: T,
  ): Promise<T>;
  input(message: string, defaultValue?: string): Promise<string>;
  /** Block until the operator is done with a manual step */
  pause(message: string): Promise<void>;
}

/** Terminal prompts via @inquirer/prompts */
export class InquirerPrompter implements Prompter {
  confirm(message: string, defaultValue = false): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }

  choose<T extends string>(
    message: string,
    choices: PromptChoice<T>[],
    defaultValue?: T,
  ): Promise<T> {
    return select<T>({ message, choices, default: defaultValue });
  }

  input(message: string, defaultValue?: string): Promise<string> {
    return input({ message, default: defaultValue });
  }

  async pause(message: string): Promise<void> {
    await input({ message });
  }
}

export type ScriptedAnswer = boolean | string;

/**
 * Non-interactive prompter answering from a queue, falling back to each
 * prompt's default once the queue is empty. Used for `--yes` and tests.
 */
export class ScriptedPrompter implements Prompter {
  /** Messages in the order they were asked */
  readonly asked: string[] = [];
  private readonly answers: ScriptedAnswer[];

  constructor(answers: ScriptedAnswer[] = []) {
    this.answers = [...answers];
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const answer = this.next(message);
    if (answer === undefined) return defaultValue;
    if (typeof answer !== 'boolean') {
      throw new Error(`Scripted answer for "${message}" must be a boolean, got "${answer}"`);
    }
    return answer;
  }

  async choose<T extends string>(
    message: string,
    choices: PromptChoice<T>[],
    defaultValue?: T,
  ): Promise<T> {
    const answer = this.next(message);
    if (answer === undefined) {
      const fallback = defaultValue ?? choices[0]?.value;
      if (fallback === undefined) throw new Error(`No choices offered for "${message}"`);
      return fallback;
    }
    const match = choices.find((c) => c.value === answer);
    if (!match) {
      throw new Error(`Scripted answer "${String(answer)}" is not a choice for "${message}"`);
    }
    return match.value;
  }

  async input(message: string, defaultValue = ''): Promise<string> {
    const answer = this.next(message);
    if (answer === undefined) return defaultValue;
    return String(answer);
  }

  async pause(message: string): Promise<void> {
    this.asked.push(message);
  }

  private next(message: string): ScriptedAnswer | undefined {
    this.asked.push(message);
    return this.answers.shift();
  }
}

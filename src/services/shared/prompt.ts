/**
 * Interactive prompts.
 */

import inquirer from 'inquirer';

export interface Prompter {
  input(message: string): Promise<string>;
}

export const inquirerPrompter: Prompter = {
  async input(message: string): Promise<string> {
    const answers = await inquirer.prompt<{ value: string }>([
      { type: 'input', name: 'value', message },
    ]);
    return answers.value;
  },
};

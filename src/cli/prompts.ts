import inquirer from 'inquirer';

export const EXIT_WORDS = ['exit', 'quit'];

export interface ChatPrompts {
  askMessage(): Promise<string>;
  confirmChanges(): Promise<boolean>;
}

export const promptForMessage = async (): Promise<string> => {
  const answers = await inquirer.prompt<{ message: string }>([
    {
      type: 'input',
      name: 'message',
      message: 'You:',
      validate: (input: string) => input.trim().length > 0 || 'Please describe what to build or change (or type "exit")',
    },
  ]);
  return answers.message.trim();
};

export const promptForConfirmation = async (): Promise<boolean> => {
  const answers = await inquirer.prompt<{ keep: boolean }>([
    {
      type: 'confirm',
      name: 'keep',
      message: 'Keep these changes?',
      default: true,
    },
  ]);
  return answers.keep;
};

export const inquirerChatPrompts: ChatPrompts = {
  askMessage: promptForMessage,
  confirmChanges: promptForConfirmation,
};

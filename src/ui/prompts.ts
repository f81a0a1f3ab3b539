import { confirm, checkbox, input } from '@inquirer/prompts';

export async function confirmPrompt(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

export async function multiselectPrompt<T>(
  message: string,
  choices: { name: string; value: T; checked?: boolean }[],
): Promise<T[]> {
  return checkbox({ message, choices });
}

export async function inputPrompt(
  message: string,
  defaultValue?: string,
  required = false,
): Promise<string> {
  const value = await input({ message, default: defaultValue, required });
  return value.trim();
}

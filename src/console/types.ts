// Console boundary: every interactive step of provisioning goes through this interface

export interface PromptOptions {
  message: string;
  help?: string;
  defaultValue?: string;
  /** Mask the input */
  secret?: boolean;
}

export interface SelectOptions {
  message: string;
  help?: string;
  options: string[];
  defaultValue?: string;
}

export interface ConfirmOptions {
  message: string;
  defaultValue?: boolean;
}

export type SpinnerOutcome = 'success' | 'failure' | 'skipped';

export interface Console {
  prompt(options: PromptOptions): Promise<string>;
  /** Resolves to the index of the chosen option */
  select(options: SelectOptions): Promise<number>;
  confirm(options: ConfirmOptions): Promise<boolean>;
  message(text: string): void;
  showSpinner(text: string): void;
  stopSpinner(text?: string, outcome?: SpinnerOutcome): void;
}

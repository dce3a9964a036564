export const cliErrorCodes = ['usage_error', 'config_error'] as const;

export type CliErrorCode = (typeof cliErrorCodes)[number];

// Commands pass failures of the core packages through with their own codes.
export type CommandError = {
  code: string;
  message: string;
};

export type CommandSuccess<T> = {ok: true; value: T};
export type CommandFailure = {ok: false; error: CommandError};
export type CommandResult<T> = CommandSuccess<T> | CommandFailure;

export const ok = <T>(value: T): CommandSuccess<T> => ({ok: true, value});

export const err = (code: CliErrorCode, message: string): CommandFailure => ({
  ok: false,
  error: {code, message}
});

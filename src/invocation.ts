/** One `edit_google_sheet` call, validated and frozen. */
export interface ToolInvocation {
  readonly prompt: string;
  readonly googleAccessToken: string;
  readonly spreadsheetId: string;
  readonly conversationId?: string;
  readonly model: string;
}

export interface EditSheetArgs {
  prompt?: string;
  google_access_token?: string;
  spreadsheet_id?: string;
  conversation_id?: string;
  model?: string;
}

export class InvalidArgumentError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.field = field;
  }
}

type RequiredField = 'prompt' | 'google_access_token' | 'spreadsheet_id';

function requireText(args: EditSheetArgs, field: RequiredField): string {
  const value = args[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidArgumentError(field, `'${field}' is required`);
  }
  return value;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Throws `InvalidArgumentError` for the first missing or blank required field. */
export function validateInvocation(args: EditSheetArgs, defaultModel: string): ToolInvocation {
  const prompt = requireText(args, 'prompt');
  const googleAccessToken = requireText(args, 'google_access_token');
  const spreadsheetId = requireText(args, 'spreadsheet_id');
  const conversationId = optionalText(args.conversation_id);

  const invocation: ToolInvocation = {
    prompt,
    googleAccessToken: googleAccessToken.trim(),
    spreadsheetId: spreadsheetId.trim(),
    model: optionalText(args.model) ?? defaultModel,
    ...(conversationId ? { conversationId } : {}),
  };
  return Object.freeze(invocation);
}

const dangerousPattern = /[<>\\{}\[\]\^`]/g;
// eslint-disable-next-line no-control-regex
const controlPattern = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const MAX_MESSAGE_LENGTH = 2000;

export const sanitizeInput = (input: string): string =>
  input.replace(controlPattern, '').replace(dangerousPattern, '').replace(/\s+/g, ' ').trim();

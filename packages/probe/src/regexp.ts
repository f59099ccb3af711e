const REGEX_SPECIAL_CHARS = /[.*+?^${}()|[\]\\]/g;

export const escapeRegExp = (value: string): string =>
  value.replace(REGEX_SPECIAL_CHARS, "\\$&");

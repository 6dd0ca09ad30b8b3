export const maxIdentifierLength = 2048;

/**
 * Parses an identifier as an absolute http(s) URL, or returns undefined.
 */
export const parseHttpIdentifier = (identifier: string): URL | undefined => {
  let parsed: URL;
  try {
    parsed = new URL(identifier);
  } catch {
    return undefined;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return undefined;
  return parsed;
};

/**
 * Identifier form that is safe to log: no credentials, no fragment.
 * Identifiers that do not parse are cut to a short prefix.
 */
export const toLoggableIdentifier = (identifier: string): string => {
  const parsed = parseHttpIdentifier(identifier);
  if (!parsed) {
    return identifier.length > 64 ? `${identifier.slice(0, 64)}...` : identifier;
  }
  return `${parsed.origin}${parsed.pathname}${parsed.search}`;
};

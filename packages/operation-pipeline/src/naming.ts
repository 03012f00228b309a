export type NamingPolicy = 'camelCase' | 'snakeCase' | 'kebabCase' | 'none';

export type TagCase = 'none' | 'title' | 'lower';

const isUpper = (char: string): boolean => char !== char.toLowerCase() && char === char.toUpperCase();

// Lowercases the leading run of capitals, keeping the last one of a run that starts a new word: URLValue -> urlValue.
function toCamelCase(name: string): string {
  if (!name || !isUpper(name[0])) {
    return name;
  }
  const chars = Array.from(name);
  for (let index = 0; index < chars.length; index += 1) {
    if (index === 1 && !isUpper(chars[index])) {
      break;
    }
    const hasNext = index + 1 < chars.length;
    if (index > 0 && hasNext && !isUpper(chars[index + 1])) {
      if (chars[index + 1] === ' ') {
        chars[index] = chars[index].toLowerCase();
      }
      break;
    }
    chars[index] = chars[index].toLowerCase();
  }
  return chars.join('');
}

function toSeparatedLower(name: string, separator: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, `$1${separator}$2`)
    .replace(/([A-Z]+)([A-Z][a-z])/g, `$1${separator}$2`)
    .replace(/[\s_-]+/g, separator)
    .toLowerCase();
}

export function applyNamingPolicy(name: string, policy: NamingPolicy): string {
  switch (policy) {
    case 'camelCase':
      return toCamelCase(name);
    case 'snakeCase':
      return toSeparatedLower(name, '_');
    case 'kebabCase':
      return toSeparatedLower(name, '-');
    case 'none':
    default:
      return name;
  }
}

/** Upper-cases the first letter of every word and lowers the rest; all-caps words are kept. */
export function toTitleCase(input: string): string {
  return input.replace(/\p{L}+/gu, (word) => {
    if (word === word.toUpperCase()) {
      return word;
    }
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
  });
}

export function formatTagName(input: string, tagCase: TagCase, stripSymbols: boolean): string {
  let value = input;
  if (tagCase === 'title') {
    value = toTitleCase(input);
  } else if (tagCase === 'lower') {
    value = input.toLowerCase();
  }
  return stripSymbols ? value.replace(/[^a-zA-Z0-9]/g, '') : value;
}

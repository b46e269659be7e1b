const ansiMatch = [
  '[\\u001B\\u009B][[\\]()#;?]*(?:(?:(?:(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]+)*|[a-zA-Z\\d]+(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]*)*)?\\u0007)',
  '(?:(?:\\d{1,4}(?:;\\d{0,4})*)?[\\dA-PR-TZcf-nq-uy=><~]))',
].join('|');

export function ansiRegex(onlyFirst?: boolean) {
  return new RegExp(ansiMatch, onlyFirst ? undefined : 'g');
}

export function stripAnsi(str: string) {
  return str.replace(ansiRegex(), '');
}

export function visibleWidth(str: string) {
  return stripAnsi(str).length;
}

export function formatNameList(label: string, names: readonly string[]): string {
  return `-- ${label}: ${names.join(', ')}\n`;
}

export function formatLocalsComment(names: readonly string[]): string {
  return formatNameList('Local values', names);
}

export function formatUpvaluesComment(names: readonly string[]): string {
  return formatNameList('Upvalues', names);
}

export function formatLineComment(line: number): string {
  return `-- Starts at line ${line}\n`;
}

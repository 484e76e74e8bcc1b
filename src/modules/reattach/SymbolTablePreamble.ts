/**
 * Block comment listing every string in the decoded symbol table, one per
 * indented line. Empty when there is nothing to list.
 */
export function formatSymbolTable(symbols: readonly string[], label = 'Symbol table'): string {
  if (symbols.length === 0) {
    return '';
  }
  // A `]]` inside an entry would close the comment early.
  const lines = symbols.map((symbol) => symbol.replace(/\]\]/g, '] ]').replace(/\r?\n/g, '\\n'));
  return `--[[ ${label}:\n\t${lines.join('\n\t')}\n]]\n`;
}

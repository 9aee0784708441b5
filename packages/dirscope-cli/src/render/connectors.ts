export const BRANCH = '├── ';
export const LAST = '└── ';
export const VERT = '│   ';
export const SPACE = '    ';

export const FILE_ICON = '📄';
export const EMPTY_DIR_ICON = '📂';
export const DIR_ICON = '📁';

export function moreItemsLabel(count: number): string {
  return `... and ${count} more items`;
}

export function moreEntriesLabel(count: number): string {
  return `... and ${count} more entries`;
}

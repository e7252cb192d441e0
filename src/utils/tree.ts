import { compareArchivePaths } from './paths';

type TreeNode = { [key: string]: TreeNode };

/** Renders slash-separated paths as an indented tree, directories first. */
export function renderTree(paths: readonly string[]): string {
  const root: TreeNode = {};

  for (const filePath of paths) {
    let current = root;
    for (const part of filePath.split('/')) {
      if (!current[part]) {
        current[part] = {};
      }
      current = current[part];
    }
  }

  return renderNode(root, '');
}

function renderNode(node: TreeNode, prefix: string): string {
  const keys = Object.keys(node).sort((a, b) => {
    const aIsLeaf = Object.keys(node[a]).length === 0;
    const bIsLeaf = Object.keys(node[b]).length === 0;

    if (aIsLeaf === bIsLeaf) {
      return compareArchivePaths(a, b);
    }
    return aIsLeaf ? 1 : -1;
  });

  let result = '';
  keys.forEach((key, index) => {
    const isLast = index === keys.length - 1;
    const marker = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    result += `${prefix}${marker}${key}\n`;

    if (Object.keys(node[key]).length > 0) {
      result += renderNode(node[key], prefix + childPrefix);
    }
  });

  return result;
}

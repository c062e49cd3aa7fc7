/**
 * Splits a wiki page into its heading tree
 */

import type { WikiSection } from './types';

const HEADING = /^(={1,6})\s*([^=\s].*?)\s*\1\s*$/;

export function splitSections(source: string): WikiSection {
  const root: WikiSection = { name: 'root', depth: 0, text: '', children: [] };
  const stack: WikiSection[] = [root];
  let current = root;
  let buffer: string[] = [];

  const flush = () => {
    current.text = buffer.join('\n').trim();
    buffer = [];
  };

  for (const line of source.split('\n')) {
    const heading = HEADING.exec(line.trimEnd());
    if (!heading) {
      buffer.push(line);
      continue;
    }

    flush();

    const section: WikiSection = { name: heading[2], depth: heading[1].length, text: '', children: [] };
    while (stack[stack.length - 1].depth >= section.depth) {
      stack.pop();
    }
    stack[stack.length - 1].children.push(section);
    stack.push(section);
    current = section;
  }

  flush();
  return root;
}

/**
 * Find a section by its path of names below the root.
 */
export function findSection(root: WikiSection, ...path: string[]): WikiSection | undefined {
  let section: WikiSection | undefined = root;
  for (const name of path) {
    section = section?.children.find(child => child.name === name);
  }
  return section;
}

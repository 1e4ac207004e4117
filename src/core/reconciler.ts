// src/core/reconciler.ts

/**
 * Minimal shape the merge needs: a name, and an `item` list when the
 * node is a folder.
 */
export interface NamedNode {
   name: string;
   item?: unknown;
}

export function isFolderNode(node: NamedNode): boolean {
   return Array.isArray(node.item);
}

/**
 * Merge freshly generated folders into the direct children of a node.
 *
 * Existing folders whose name appears among `newFolders` are dropped;
 * everything else keeps its relative order and is followed by
 * `newFolders` in their given order. Request items are never dropped.
 * Only this one level is looked at.
 */
export function mergeFolders<T extends NamedNode>(
   existingChildren: readonly T[],
   newFolders: readonly T[],
): T[] {
   if (newFolders.length === 0) return [...existingChildren];

   const replaced = new Set(newFolders.map((f) => f.name));
   const preserved = existingChildren.filter(
      (child) => !(isFolderNode(child) && replaced.has(child.name)),
   );

   return [...preserved, ...newFolders];
}

/**
 * Keep only the last folder of each name, at the position of that last
 * occurrence. `onDuplicate` is told about every folder that lost.
 */
export function collapseDuplicateFolders<T extends NamedNode>(
   folders: readonly T[],
   onDuplicate?: (name: string) => void,
): T[] {
   const lastIndex = new Map<string, number>();
   folders.forEach((f, i) => lastIndex.set(f.name, i));

   return folders.filter((f, i) => {
      if (lastIndex.get(f.name) === i) return true;
      onDuplicate?.(f.name);
      return false;
   });
}

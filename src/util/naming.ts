// src/util/naming.ts

/**
 * Lower-case a record type name and join its words with underscores,
 * the way module and controller paths spell it.
 *
 * "Sales Invoice" -> "sales_invoice"
 */
export function toSnakeName(name: string): string {
   return name.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Last segment of a dotted path.
 */
export function lastSegment(dottedPath: string): string {
   const idx = dottedPath.lastIndexOf('.');
   return idx === -1 ? dottedPath : dottedPath.slice(idx + 1);
}

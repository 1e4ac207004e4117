// src/schema/record-type.ts

/**
 * Field types understood by the request-body generator. Anything else
 * read from a schema file is normalized to `'Data'`.
 */
export const FIELD_TYPES = [
   'Data',
   'Text',
   'Small Text',
   'Long Text',
   'Text Editor',
   'Markdown Editor',
   'Code',
   'Int',
   'Float',
   'Currency',
   'Percent',
   'Check',
   'Select',
   'Link',
   'Dynamic Link',
   'Date',
   'Datetime',
   'Time',
   'Duration',
   'Rating',
   'Table',
   'Table MultiSelect',
   'Attach',
   'Attach Image',
   'Barcode',
   'Color',
   'Geolocation',
   'Signature',
   'Password',
   'Read Only',
   'JSON',
   'Section Break',
   'Column Break',
   'Tab Break',
   'HTML',
   'Button',
   'Heading',
   'Image',
   'Fold',
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export function isFieldType(value: unknown): value is FieldType {
   return FIELD_TYPES.some((t) => t === value);
}

/**
 * One field of a record type, as exposed by the schema source.
 */
export interface FieldSchema {
   name: string;
   label: string;
   kind: FieldType;
   required: boolean;
   readOnly: boolean;
   hidden: boolean;
   /**
    * Link target or newline-separated select choices.
    */
   options?: string;
   description?: string;
}

export interface RecordTypeSchema {
   name: string;
   /**
    * Grouping the record type belongs to. Empty when the schema file
    * declares none.
    */
   module: string;
   /**
    * Child tables are only reachable through their parent and never get
    * endpoints of their own.
    */
   isTable: boolean;
   description?: string;
   fields: FieldSchema[];
}

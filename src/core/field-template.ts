// src/core/field-template.ts

import type { FieldSchema, FieldType } from '../schema';

/**
 * Layout-only field types that never carry data.
 */
export const STRUCTURAL_FIELD_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
   'Section Break',
   'Column Break',
   'Tab Break',
   'HTML',
   'Button',
   'Heading',
   'Fold',
]);

/**
 * Fields the platform manages itself: audit columns, document state,
 * tree position, workflow and user session details.
 */
export const SYSTEM_FIELD_NAMES: ReadonlySet<string> = new Set([
   'name',
   'doctype',
   'creation',
   'modified',
   'modified_by',
   'owner',
   'docstatus',
   'idx',
   'parent',
   'parentfield',
   'parenttype',
   'amended_from',
   'creation_date',
   'modified_date',
   'lft',
   'rgt',
   'old_parent',
   'workflow_state',
   '_assign',
   '_comments',
   '_liked_by',
   '_user_tags',
   'user',
   'user_type',
   'last_login',
   'login_after',
   'logout_time',
   'last_ip',
   'last_login_ip',
   'api_key',
   'api_secret',
]);

export type TemplateValue =
   | string
   | number
   | TemplateValue[]
   | { [key: string]: TemplateValue };

export type BodyTemplate = Record<string, TemplateValue>;

/**
 * Example value for a field of the given type.
 */
export function defaultValueFor(kind: FieldType): TemplateValue {
   switch (kind) {
      case 'Int':
      case 'Check':
      case 'Duration':
      case 'Rating':
         return 0;
      case 'Float':
      case 'Currency':
      case 'Percent':
         return 0.0;
      case 'Table':
      case 'Table MultiSelect':
         return [];
      case 'Geolocation':
         return { latitude: 0.0, longitude: 0.0 };
      default:
         return '';
   }
}

export function isWritableField(field: FieldSchema): boolean {
   return (
      !STRUCTURAL_FIELD_TYPES.has(field.kind) &&
      !SYSTEM_FIELD_NAMES.has(field.name) &&
      !field.readOnly
   );
}

/**
 * Request body skeleton for creating or updating a record: the record
 * type and an empty name, then one key per writable field.
 */
export function buildFieldTemplate(recordTypeName: string, fields: FieldSchema[]): BodyTemplate {
   const template: BodyTemplate = {
      doctype: recordTypeName,
      name: '',
   };

   for (const field of fields) {
      if (!isWritableField(field)) continue;
      template[field.name] = defaultValueFor(field.kind);
   }

   return template;
}

/**
 * Body used when the record type's fields could not be looked up.
 */
export function genericFieldTemplate(recordTypeName: string): BodyTemplate {
   return {
      doctype: recordTypeName,
      name: '',
      field1: '',
      field2: '',
      field3: '',
   };
}

export const CUSTOM_METHOD_BODY: BodyTemplate = {
   args: ['arg1', 'arg2'],
   kwargs: { key: 'value' },
};

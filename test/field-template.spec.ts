// test/field-template.spec.ts

import {describe, it, expect} from 'vitest';
import {buildFieldTemplate, defaultValueFor, isWritableField} from '../src/core/field-template';
import {field} from './fixtures';

describe('defaultValueFor', () => {
    it('picks an example value per field type', () => {
        expect(defaultValueFor('Int')).toBe(0);
        expect(defaultValueFor('Percent')).toBe(0);
        expect(defaultValueFor('Table MultiSelect')).toEqual([]);
        expect(defaultValueFor('Geolocation')).toEqual({latitude: 0, longitude: 0});
        expect(defaultValueFor('Link')).toBe('');
    });
});

describe('isWritableField', () => {
    it('rejects layout, system and read-only fields', () => {
        expect(isWritableField(field('section_1', 'Section Break'))).toBe(false);
        expect(isWritableField(field('docstatus', 'Int'))).toBe(false);
        expect(isWritableField(field('total', 'Currency', {readOnly: true}))).toBe(false);
        expect(isWritableField(field('remarks', 'Small Text'))).toBe(true);
    });
});

describe('buildFieldTemplate', () => {
    it('starts with doctype and name, then writable fields in schema order', () => {
        const template = buildFieldTemplate('Task', [
            field('subject'),
            field('tab', 'Tab Break'),
            field('priority', 'Rating'),
            field('location', 'Geolocation'),
        ]);

        expect(Object.keys(template)).toEqual(['doctype', 'name', 'subject', 'priority', 'location']);
        expect(template.priority).toBe(0);
    });
});

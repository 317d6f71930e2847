import { describe, it, expect } from 'vitest';
import { parseXml } from './dom.js';
import { displayStyleName, headingLevelOf, StyleSheet } from './styles.js';
import { STYLES_XML } from './test-utils/docx-fixtures.js';

describe('displayStyleName', () => {
    it('capitalises built-in lowercase names', () => {
        expect(displayStyleName('heading 3')).toBe('Heading 3');
        expect(displayStyleName('caption')).toBe('Caption');
        expect(displayStyleName('Body Text')).toBe('Body Text');
    });
});

describe('StyleSheet', () => {
    const sheet = new StyleSheet(parseXml(STYLES_XML));

    it('resolves style ids to display names', () => {
        expect(sheet.paragraphStyleName('Heading1')).toBe('Heading 1');
        expect(sheet.paragraphStyleName('Caption')).toBe('Caption');
    });

    it('falls back to the default paragraph style', () => {
        expect(sheet.paragraphStyleName(null)).toBe('Normal');
        expect(sheet.paragraphStyleName('Missing')).toBe('Normal');
        expect(sheet.paragraphStyleName('Strong')).toBe('Normal');
    });

    it('finds paragraph styles by name, loose name, then id', () => {
        expect(sheet.findParagraphStyle('Heading 2')).toBe('Heading2');
        expect(sheet.findParagraphStyle('body text')).toBe('BodyText');
        expect(sheet.findParagraphStyle('BodyText')).toBe('BodyText');
    });

    it('ignores character styles and unknown names', () => {
        expect(sheet.findParagraphStyle('Strong')).toBeNull();
        expect(sheet.findParagraphStyle('Nope')).toBeNull();
    });

    it('treats a package without styles as empty', () => {
        const empty = new StyleSheet(null);
        expect(empty.isEmpty).toBe(true);
        expect(empty.paragraphStyleName('Heading1')).toBe('Normal');
        expect(empty.findParagraphStyle('Heading 1')).toBeNull();
    });
});

describe('headingLevelOf', () => {
    it('reads the level from Heading N names', () => {
        expect(headingLevelOf('Heading 3', 'Heading3')).toBe(3);
    });

    it('accepts bare numeric style ids', () => {
        expect(headingLevelOf('Kop 2', '2')).toBe(2);
    });

    it('rejects everything else', () => {
        expect(headingLevelOf('Heading', null)).toBeNull();
        expect(headingLevelOf('Heading 0', 'Heading0')).toBeNull();
        expect(headingLevelOf('Normal', '10')).toBeNull();
        expect(headingLevelOf('Normal', null)).toBeNull();
    });
});

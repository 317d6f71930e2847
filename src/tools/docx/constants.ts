/**
 * Namespaces, unit conversions and limits shared by the DOCX modules.
 */

// ═══════════════════════════════════════════════════════════════════════
// Image MIME types
// ═══════════════════════════════════════════════════════════════════════

export const IMAGE_MIME_TYPES: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.bmp': 'image/bmp',
    '.tiff': 'image/tiff',
    '.tif': 'image/tiff',
    '.svg': 'image/svg+xml',
    '.webp': 'image/webp',
};

export function getMimeType(ext: string): string {
    return IMAGE_MIME_TYPES[ext.toLowerCase()] ?? 'application/octet-stream';
}

// ═══════════════════════════════════════════════════════════════════════
// Length conversion (English Metric Units)
// ═══════════════════════════════════════════════════════════════════════

/**
 * 1 inch = 914400 EMU, 1 cm = 360000 EMU, 1 twip = 635 EMU,
 * 1 px ≈ 9525 EMU (at 96 DPI).
 */
export const EMU_PER_INCH = 914400;
export const EMU_PER_CM = 360000;
export const EMU_PER_TWIP = 635;
export const PX_TO_EMU = 9525;

/** Centimeters to whole EMU, truncating toward zero. */
export function cmToEmu(cm: number): number {
    return Math.trunc(cm * EMU_PER_CM);
}

/** EMU to centimeters, rounded to 2 decimals. */
export function emuToCm(emu: number): number {
    return roundTo((emu / EMU_PER_INCH) * 2.54, 2);
}

export function cmToTwips(cm: number): number {
    return Math.round(cmToEmu(cm) / EMU_PER_TWIP);
}

export function twipsToCm(twips: number): number {
    return roundTo((twips * EMU_PER_TWIP) / EMU_PER_CM, 2);
}

export function pixelsToEmu(px: number): number {
    return Math.round(px * PX_TO_EMU);
}

export function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

// ═══════════════════════════════════════════════════════════════════════
// XML namespaces
// ═══════════════════════════════════════════════════════════════════════

export const NAMESPACES = {
    W: 'http://schemas.openxmlformats.org/wordprocessingml/2006/main',
    WP: 'http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing',
    A: 'http://schemas.openxmlformats.org/drawingml/2006/main',
    PIC: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
    R: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
    RELS: 'http://schemas.openxmlformats.org/package/2006/relationships',
    CONTENT_TYPES: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

/** a:graphicData/@uri values that identify the kind of an inline shape. */
export const GRAPHIC_DATA_URIS = {
    PICTURE: 'http://schemas.openxmlformats.org/drawingml/2006/picture',
    CHART: 'http://schemas.openxmlformats.org/drawingml/2006/chart',
    DIAGRAM: 'http://schemas.openxmlformats.org/drawingml/2006/diagram',
} as const;

export const RELATIONSHIP_TYPES = {
    IMAGE: `${NAMESPACES.R}/image`,
    SETTINGS: `${NAMESPACES.R}/settings`,
} as const;

export const SETTINGS_CONTENT_TYPE =
    'application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml';

// ═══════════════════════════════════════════════════════════════════════
// Schema child order
// ═══════════════════════════════════════════════════════════════════════

/** CT_PPr child sequence. Word rejects properties written out of order. */
export const PPR_CHILD_ORDER = [
    'w:pStyle', 'w:keepNext', 'w:keepLines', 'w:pageBreakBefore', 'w:framePr',
    'w:widowControl', 'w:numPr', 'w:suppressLineNumbers', 'w:pBdr', 'w:shd',
    'w:tabs', 'w:suppressAutoHyphens', 'w:kinsoku', 'w:wordWrap',
    'w:overflowPunct', 'w:topLinePunct', 'w:autoSpaceDE', 'w:autoSpaceDN',
    'w:bidi', 'w:adjustRightInd', 'w:snapToGrid', 'w:spacing', 'w:ind',
    'w:contextualSpacing', 'w:mirrorIndents', 'w:suppressOverlap', 'w:jc',
    'w:textDirection', 'w:textAlignment', 'w:textboxTightWrap', 'w:outlineLvl',
    'w:divId', 'w:cnfStyle', 'w:rPr', 'w:sectPr', 'w:pPrChange',
] as const;

/** CT_RPr child sequence. */
export const RPR_CHILD_ORDER = [
    'w:rStyle', 'w:rFonts', 'w:b', 'w:bCs', 'w:i', 'w:iCs', 'w:caps',
    'w:smallCaps', 'w:strike', 'w:dstrike', 'w:outline', 'w:shadow', 'w:emboss',
    'w:imprint', 'w:noProof', 'w:snapToGrid', 'w:vanish', 'w:webHidden',
    'w:color', 'w:spacing', 'w:w', 'w:kern', 'w:position', 'w:sz', 'w:szCs',
    'w:highlight', 'w:u', 'w:effect', 'w:bdr', 'w:shd', 'w:fitText',
    'w:vertAlign', 'w:rtl', 'w:cs', 'w:em', 'w:lang', 'w:eastAsianLayout',
    'w:specVanish', 'w:oMath',
] as const;

/** Tail of the CT_Settings sequence, from w:updateFields onward. */
export const SETTINGS_CHILD_ORDER = [
    'w:updateFields', 'w:hdrShapeDefaults', 'w:footnotePr', 'w:endnotePr',
    'w:compat', 'w:docVars', 'w:rsids', 'm:mathPr', 'w:attachedSchema',
    'w:themeFontLang', 'w:clrSchemeMapping', 'w:doNotIncludeSubdocsInStats',
    'w:doNotAutoCompressPictures', 'w:forceUpgrade', 'w:captions',
    'w:readModeInkLockDown', 'w:smartTagType', 'sl:schemaLibrary',
    'w:shapeDefaults', 'w:doNotEmbedSmartTags', 'w:decimalSymbol',
    'w:listSeparator',
] as const;

// ═══════════════════════════════════════════════════════════════════════
// Default values
// ═══════════════════════════════════════════════════════════════════════

export const DEFAULT_IMAGE_WIDTH_PX = 300;
export const DEFAULT_IMAGE_HEIGHT_PX = 200;

export const OUTLINE_TEXT_LIMIT = 100;
export const TABLE_PREVIEW_LIMIT = 50;

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    CONTENT_TYPES: '[Content_Types].xml',
    DOCUMENT_XML: 'word/document.xml',
    DOCUMENT_RELS: 'word/_rels/document.xml.rels',
    ROOT_RELS: '_rels/.rels',
    STYLES_XML: 'word/styles.xml',
    SETTINGS_XML: 'word/settings.xml',
    MEDIA_FOLDER: 'word/media',
} as const;

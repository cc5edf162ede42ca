import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const COMMENT_KEY = '#comment';
const TEXT_KEY = '#text';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isElementName(key: string): boolean {
    return !key.startsWith('?') && key !== COMMENT_KEY && key !== TEXT_KEY && key !== ATTRIBUTES_KEY;
}

/**
 * Returns the reason an XML document is not well-formed, or undefined if it is.
 */
export function xmlSyntaxError(xml: string): string | undefined {
    const result = XMLValidator.validate(xml);
    if (result === true) {
        return undefined;
    }
    return `${result.err.msg} (line ${result.err.line})`;
}

/**
 * Reads an attribute of the root element. The document must be well-formed.
 */
export function readRootAttribute(xml: string, attribute: string): string | undefined {
    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: ATTRIBUTE_PREFIX,
        parseAttributeValue: false
    });
    const document: unknown = parser.parse(xml);
    if (!isRecord(document)) {
        return undefined;
    }

    const rootName = Object.keys(document).find(isElementName);
    const root = rootName === undefined ? undefined : document[rootName];
    if (!isRecord(root)) {
        return undefined;
    }

    const value = root[ATTRIBUTE_PREFIX + attribute];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * Sets an attribute of the root element, leaving the rest of the document
 * (order, comments and text) as it is.
 */
export function setRootAttribute(xml: string, attribute: string, value: string): string {
    const options = {
        ignoreAttributes: false,
        attributeNamePrefix: ATTRIBUTE_PREFIX,
        preserveOrder: true,
        commentPropName: COMMENT_KEY,
        parseTagValue: false,
        parseAttributeValue: false,
        trimValues: false
    };

    const nodes: unknown = new XMLParser(options).parse(xml);
    if (!Array.isArray(nodes)) {
        throw new TypeError('The XML document has no root element.');
    }

    const root: unknown = nodes.find(node => isRecord(node) && Object.keys(node).some(isElementName));
    if (!isRecord(root)) {
        throw new TypeError('The XML document has no root element.');
    }

    const attributes = isRecord(root[ATTRIBUTES_KEY]) ? root[ATTRIBUTES_KEY] : {};
    root[ATTRIBUTES_KEY] = { ...attributes, [ATTRIBUTE_PREFIX + attribute]: value };

    return new XMLBuilder(options).build(nodes);
}

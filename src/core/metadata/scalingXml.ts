// src/core/metadata/scalingXml.ts

import type { ILogger, ScalingEntry } from '../../@types/index.ts';
import { DOMParser } from '@xmldom/xmldom';
import { FramingError } from '../../utils/errors.ts';

const SCALING_ROOT = 'ChannelInfo';

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

function elementChildren(parent: Node): Element[] {
    const elements: Element[] = [];
    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (isElement(child)) elements.push(child);
    }
    return elements;
}

function readNumberAttribute(el: Element, name: string, fallback: number, logger: ILogger): number {
    if (!el.hasAttribute(name)) return fallback;
    const raw = el.getAttribute(name) ?? '';
    const value = Number(raw.trim());
    if (raw.trim() === '' || Number.isNaN(value)) {
        logger.warn(`Ignoring ${name}="${raw}" on <${el.tagName}>, using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Extracts the per-channel scaling from a channel configuration document.
 * Every child of the `ChannelInfo` root is one channel in stream order; its first
 * child element carries optional `factor` and `offset` attributes.
 *
 * @return One entry per channel, in document order. Empty when the root is not `ChannelInfo`.
 */
export function parseScalingXml(xml: string, logger: ILogger): ScalingEntry[] {
    const fatal = (message: string): never => {
        throw new FramingError(`Invalid channel configuration XML: ${message}`);
    };
    const doc = new DOMParser({
        errorHandler: {
            warning: (message: string) => logger.debug(`XML: ${message}`),
            error: fatal,
            fatalError: fatal,
        },
    }).parseFromString(xml, 'text/xml');

    const root = doc.documentElement;
    if (!root) {
        return fatal('document has no root element');
    }
    if (root.tagName !== SCALING_ROOT) {
        logger.debug(`XML root <${root.tagName}> carries no channel scaling`);
        return [];
    }

    const entries: ScalingEntry[] = [];
    for (const channel of elementChildren(root)) {
        const [scaling] = elementChildren(channel);
        if (!scaling) {
            entries.push({ factor: 1, offset: 0 });
            continue;
        }
        entries.push({
            factor: readNumberAttribute(scaling, 'factor', 1, logger),
            offset: readNumberAttribute(scaling, 'offset', 0, logger),
        });
    }
    return entries;
}

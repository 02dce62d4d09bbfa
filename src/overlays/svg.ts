import type { LabelOverlay } from './types';

const XML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&apos;',
};

export const escapeXml = (value: string): string => value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);

const labelElement = (label: LabelOverlay): string => {
    const { style } = label;
    const attributes = [
        `x="${label.position.x}"`,
        `y="${label.position.y}"`,
        `font-family="${escapeXml(style.font)}"`,
        `font-size="${style.size}"`,
        `fill="${style.color.toCss()}"`,
        'dominant-baseline="hanging"',
    ];
    if (style.strokeWidth > 0 && !style.strokeColor.isTransparent) {
        attributes.push(
            `stroke="${style.strokeColor.toCss()}"`,
            `stroke-width="${style.strokeWidth}"`,
            'paint-order="stroke"',
        );
    }
    return `<text ${attributes.join(' ')}>${escapeXml(label.text)}</text>`;
};

/** A transparent SVG document of the given size holding one `<text>` per label. */
export const buildLabelSvg = (width: number, height: number, labels: readonly LabelOverlay[]): string => {
    const body = labels.map(labelElement).join('');
    return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${body}</svg>`;
};

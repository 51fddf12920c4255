import { APP_NAME } from './constants';
import type { Gateway } from './gateway';

const ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&nbsp;': ' ',
};

/** Drop markup and decode the handful of entities news messages use. */
export function stripHtmlTags(html: string): string {
    return html
        .replace(/<[^>]*>/g, '')
        .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity);
}

export function newsTitle(gateway: Gateway): string {
    return `New message from ${gateway.name}`;
}

/** Plain-text body for a desktop notification; paragraphs become blank lines. */
export function newsPlainText(html: string): string {
    return stripHtmlTags(html.replaceAll('<p>', '\n\n'));
}

export const UPGRADE_REQUIRED_TITLE = 'Upgrade required';

export function upgradeRequiredBody(gateway: Gateway, appName: string = APP_NAME): string {
    return `A message was received from ${gateway.name} in an unsupported format. This `
        + `suggests that you are running an out-of-date version of ${appName}.\n\n`
        + 'To avoid seeing this warning, please upgrade to the latest version.';
}

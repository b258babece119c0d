// Utility functions shared by the mail backend and the tools

import TurndownService from 'turndown';
import sanitizeHtml from 'sanitize-html';
import { BackendTimeoutError } from './errors';

const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
    linkStyle: 'inlined',
    linkReferenceStyle: 'full'
});

// <img> is dropped along with scripts; in mail it is mostly tracking pixels
const BODY_SANITIZE_OPTIONS: sanitizeHtml.IOptions = {
    allowedTags: [
        'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
        'blockquote', 'p', 'a', 'ul', 'ol', 'li',
        'b', 'strong', 'i', 'em', 'code', 'pre', 'br'
    ],
    allowedAttributes: {
        a: ['href', 'title']
    },
    exclusiveFilter: frame => frame.tag === 'a' && !frame.text.trim()
};

/** Email HTML body → Markdown, with runs of blank lines collapsed. */
export function htmlToMarkdown(html: string): string {
    const markdown = turndownService.turndown(sanitizeHtml(html, BODY_SANITIZE_OPTIONS));
    return markdown.replace(/\n{3,}/g, '\n\n').trim();
}

/** Provider-native search queries travel URL-encoded. */
export function encodeNative(q: string): string {
    return encodeURIComponent(q.trim());
}

export function truncateString(str: string, maxLength: number = 100): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + '...';
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function chunk<T>(items: T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        out.push(items.slice(i, i + size));
    }
    return out;
}

export interface RetryOptions {
    /** Total attempts, including the first one. */
    attempts: number;
    baseDelayMs: number;
    shouldRetry: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

/**
 * Retries a function with exponential backoff and +/- 10% jitter. Errors the
 * predicate rejects are rethrown immediately.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.attempts);

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= attempts - 1 || !options.shouldRetry(error)) {
                throw error;
            }
            const delay = options.baseDelayMs * Math.pow(2, attempt);
            const jitter = delay * 0.2 * (Math.random() - 0.5);
            const waitTime = Math.max(0, Math.round(delay + jitter));
            options.onRetry?.(error, attempt + 1, waitTime);
            await sleep(waitTime);
        }
    }
}

/**
 * Bounds a promise by a timeout. The underlying operation is not cancelled;
 * its eventual outcome is ignored.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new BackendTimeoutError(operation, timeoutMs)), timeoutMs);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

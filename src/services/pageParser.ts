import * as cheerio from 'cheerio';
import type { Heading, ImageRef, PageData, PageLink } from '../types/analysis.js';

export interface ResponseMeta {
    url: string;
    statusCode: number;
    responseTimeMs: number;
    byteSize: number;
}

export interface ParserOptions {
    /** Unset or 0 keeps the full text. */
    maxTextChars?: number;
    maxImages?: number;
}

export interface PageParser {
    parse(html: string, response: ResponseMeta): PageData;
}

export const SOCIAL_DOMAINS = [
    'facebook.com', 'twitter.com', 'x.com', 'linkedin.com',
    'instagram.com', 'youtube.com', 'tiktok.com', 'github.com',
];

const PRIVACY_KEYWORDS = ['privacy policy', 'privacy-policy', 'privacypolicy'];
const CONTACT_KEYWORDS = ['contact us', 'contact@', 'mailto:', 'phone', 'tel:'];
const SKIPPED_HREF = /^(#|mailto:|tel:|javascript:)/i;
const CONTEXT_CHARS = 200;
const LINK_TEXT_CHARS = 100;

function clean(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function bareHost(hostname: string): string {
    return hostname.toLowerCase().replace(/^www\./, '');
}

function isSocialHost(host: string): boolean {
    return SOCIAL_DOMAINS.some((d) => host === d || host.endsWith(`.${d}`));
}

function resolve(href: string, base: string): URL | null {
    try {
        return new URL(href, base);
    } catch {
        return null;
    }
}

/**
 * Turns raw HTML into PageData. Text is read from a copy with page chrome
 * (header, footer, nav) and non-content tags removed; everything else is
 * read from the untouched document.
 */
export function parsePage(html: string, response: ResponseMeta, options: ParserOptions = {}): PageData {
    const { maxTextChars, maxImages = 3 } = options;
    const $ = cheerio.load(html);
    const pageUrl = response.url;
    const baseHost = bareHost(resolve(pageUrl, pageUrl)?.hostname ?? '');

    // ---------- Head ----------

    const title = clean($('title').first().text());
    const metaDescription = clean($('meta[name="description" i]').attr('content') ?? '');

    const meta: Record<string, string> = {};
    $('meta').each((_, el) => {
        const key = $(el).attr('name') ?? $(el).attr('property');
        const content = $(el).attr('content');
        if (key && content !== undefined && !(key.toLowerCase() in meta)) {
            meta[key.toLowerCase()] = content.trim();
        }
    });

    // ---------- Text ----------

    const $text = cheerio.load(html);
    $text('script, style, noscript, header, footer, nav').remove();
    // Separate adjacent elements so words from sibling blocks do not merge.
    $text('body *').each((_, el) => {
        $text(el).prepend(' ').append(' ');
    });
    const fullText = clean($text('body').text());
    const textContent = maxTextChars && maxTextChars > 0 ? fullText.slice(0, maxTextChars) : fullText;

    // ---------- Headings ----------

    const headings: Heading[] = [];
    $('h1, h2, h3, h4, h5, h6').each((_, el) => {
        const text = clean($(el).text());
        if (text) headings.push({ level: Number(el.tagName.slice(1)), text });
    });

    // ---------- Images ----------

    const images: ImageRef[] = [];
    const seenImages = new Set<string>();
    $('img').each((_, el) => {
        if (images.length >= maxImages) return false;
        const src = $(el).attr('src') || $(el).attr('data-src') || '';
        if (!src || src.startsWith('data:')) return;
        const abs = resolve(src, pageUrl);
        if (!abs || !['http:', 'https:'].includes(abs.protocol) || seenImages.has(abs.href)) return;
        seenImages.add(abs.href);

        const caption = clean($(el).closest('figure').find('figcaption').first().text());
        const context = caption || clean($(el).parent().text());
        images.push({
            url: abs.href,
            alt: clean($(el).attr('alt') ?? ''),
            context: context.slice(0, CONTEXT_CHARS),
        });
        return;
    });

    // ---------- Links ----------

    const links: PageLink[] = [];
    const socialLinks: string[] = [];
    $('a[href]').each((_, el) => {
        const href = ($(el).attr('href') ?? '').trim();
        if (!href || SKIPPED_HREF.test(href)) return;
        const abs = resolve(href, pageUrl);
        if (!abs || !['http:', 'https:'].includes(abs.protocol)) return;

        const host = bareHost(abs.hostname);
        const internal = host === baseHost;
        links.push({ href: abs.href, text: clean($(el).text()).slice(0, LINK_TEXT_CHARS), internal });
        if (!internal && isSocialHost(host) && !socialLinks.includes(abs.href)) {
            socialLinks.push(abs.href);
        }
    });

    // ---------- Signals ----------

    const lowerHtml = html.toLowerCase();
    const hasHttps = pageUrl.toLowerCase().startsWith('https://');

    return {
        url: pageUrl,
        title,
        metaDescription,
        textContent,
        images,
        headings,
        links,
        socialLinks,
        meta,
        http: {
            statusCode: response.statusCode,
            responseTimeMs: response.responseTimeMs,
            byteSize: response.byteSize,
        },
        security: {
            hasHttps,
            // A successful https fetch implies the certificate validated.
            hasCertificate: hasHttps,
        },
        signals: {
            hasViewportMeta: $('meta[name="viewport" i]').length > 0,
            hasCharset: $('meta[charset], meta[http-equiv="content-type" i]').length > 0,
            hasLangAttr: Boolean($('html').attr('lang')?.trim()),
            hasFavicon: $('link[rel*="icon" i]').length > 0,
            hasStructuredData: $('script[type="application/ld+json" i], [itemscope]').length > 0,
            hasPrivacyPolicy: PRIVACY_KEYWORDS.some((kw) => lowerHtml.includes(kw)),
            hasContactInfo: CONTACT_KEYWORDS.some((kw) => lowerHtml.includes(kw)),
            formsCount: $('form').length,
            scriptsCount: $('script').length,
            stylesheetsCount: $('link[rel*="stylesheet" i]').length,
        },
    };
}

export class CheerioPageParser implements PageParser {
    constructor(private readonly options: ParserOptions = {}) {}

    parse(html: string, response: ResponseMeta): PageData {
        return parsePage(html, response, this.options);
    }
}

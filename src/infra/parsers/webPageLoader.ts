import { Readability } from "@mozilla/readability";
import { DOMWindow, JSDOM } from "jsdom";
import { ExtractionError } from "../../domain/errors.js";

export interface LoadedPage {
  title: string | null;
  text: string;
}

export interface PageLoader {
  fetch(url: string): Promise<LoadedPage>;
}

export interface WebPageLoaderOptions {
  timeoutMs: number;
  minTextChars: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; grounded-rag-mcp/0.1; +web ingest)";

// Fallback only: Readability does its own boilerplate scoring.
const DROPPED_SELECTOR = "script, style, noscript, template, svg, iframe, nav, aside";
const PAGE_CHROME_SELECTOR = "header, footer";

const BLOCK_TAGS = new Set([
  "address", "article", "blockquote", "dd", "div", "dl", "dt", "figcaption", "figure",
  "h1", "h2", "h3", "h4", "h5", "h6", "li", "main", "ol", "p", "pre", "section",
  "table", "tbody", "td", "th", "thead", "tr", "ul",
]);

const NAV_LINE_PHRASES = ["cookie", "privacy", "terms", "sign in", "log in"];

export class WebPageLoader implements PageLoader {
  constructor(private readonly options: WebPageLoaderOptions) {}

  async fetch(url: string): Promise<LoadedPage> {
    if (!isHttpUrl(url)) {
      throw new ExtractionError(url, "only http and https URLs are supported");
    }

    const { response, body } = await this.download(url);

    if (!response.ok) {
      await response.body?.cancel();
      throw new ExtractionError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }

    const contentType = response.headers.get("content-type") ?? "";
    const mimeType = contentType.split(";")[0].trim().toLowerCase();

    let page: LoadedPage;
    if (isHtmlMimeType(mimeType)) {
      page = extractHtmlPage(body, url);
    } else if (isTextMimeType(mimeType)) {
      page = { title: null, text: body.replace(/\r\n?/g, "\n").trim() };
    } else {
      throw new ExtractionError(url, `unsupported content type ${contentType}`);
    }

    if (page.text.length < this.options.minTextChars) {
      throw new ExtractionError(
        url,
        `extracted ${page.text.length} characters, need at least ${this.options.minTextChars} (the page may be rendered by JavaScript)`,
      );
    }
    return page;
  }

  private async download(url: string): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: "follow",
        headers: {
          "User-Agent": this.options.userAgent ?? DEFAULT_USER_AGENT,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
      });
      return { response, body: response.ok ? await response.text() : "" };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Timed out fetching ${url} after ${this.options.timeoutMs} ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Readability picks the article body; when it finds nothing the page is
 * read from `<main>` (or `<body>`) minus navigation and page chrome.
 */
export function extractHtmlPage(html: string, url: string): LoadedPage {
  const dom = new JSDOM(html, { url });
  try {
    const { document } = dom.window;
    const documentTitle = document.title.trim();
    const article = new Readability<Node>(document, { serializer: (node) => node }).parse();

    const articleText = article?.content ? cleanLines(collectText(article.content, dom.window)) : "";
    if (articleText) {
      const title = article?.title?.trim() || documentTitle;
      return { title: title || null, text: articleText };
    }

    // Readability mutates the tree it scores, so the fallback reads a fresh parse.
    const fresh = new JSDOM(html, { url });
    try {
      return {
        title: documentTitle || null,
        text: extractFallbackText(fresh.window.document, fresh.window),
      };
    } finally {
      fresh.window.close();
    }
  } finally {
    dom.window.close();
  }
}

export function extractFallbackText(document: Document, window: DOMWindow): string {
  document.querySelectorAll(DROPPED_SELECTOR).forEach((element) => element.remove());
  // A header inside an article is part of the content.
  document.querySelectorAll(PAGE_CHROME_SELECTOR).forEach((element) => {
    if (!element.parentElement?.closest("article, main")) {
      element.remove();
    }
  });

  const root = document.querySelector("main") ?? document.body;
  return cleanLines(collectText(root, window));
}

function collectText(root: Node, window: DOMWindow): string {
  const parts: string[] = [];
  const visit = (node: Node) => {
    if (node instanceof window.Text) {
      parts.push(node.data.replace(/\s+/g, " "));
      return;
    }
    if (!(node instanceof window.Element)) {
      return;
    }
    const tag = node.tagName.toLowerCase();
    if (tag === "br") {
      parts.push("\n");
      return;
    }
    const block = BLOCK_TAGS.has(tag);
    if (block) {
      parts.push("\n\n");
    }
    node.childNodes.forEach(visit);
    if (block) {
      parts.push("\n\n");
    }
  };
  visit(root);
  return parts.join("");
}

function cleanLines(text: string): string {
  const lines: string[] = [];
  for (const rawLine of text.split("\n")) {
    const line = rawLine.replace(/[ \t\u00A0]+/g, " ").trim();
    if (!line) {
      lines.push("");
      continue;
    }
    if (line.length <= 2) {
      continue;
    }
    const lower = line.toLowerCase();
    if (line.length < 80 && NAV_LINE_PHRASES.some((phrase) => lower.includes(phrase))) {
      continue;
    }
    lines.push(line);
  }
  return lines.join("\n").replace(/\n{3,}/g, "\n\n").trim();
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

function isHtmlMimeType(mimeType: string): boolean {
  return mimeType === "" || mimeType === "text/html" || mimeType === "application/xhtml+xml";
}

function isTextMimeType(mimeType: string): boolean {
  return (
    mimeType.startsWith("text/") ||
    mimeType === "application/json" ||
    mimeType === "application/xml" ||
    mimeType === "application/markdown"
  );
}

import axios from "axios";
import { setTimeout as sleep } from "node:timers/promises";

import { describeError } from "../errors";
import type { SourceDocument } from "../types/records";
import { createLogger } from "../utils/logger";
import { extractLinks, extractText, extractTitle } from "./html";
import type { DocumentSource } from "./types";

export type PageFetcher = (url: string) => Promise<string>;

export type WebCrawlerOptions = {
  url: string;
  maxPages: number;
  /** Seconds to wait between requests. */
  delay: number;
  allowedPaths?: string[];
  fetchPage?: PageFetcher;
  now?: () => Date;
};

const USER_AGENT = "kb-helpdesk/0.1";
const REQUEST_TIMEOUT_MS = 15_000;

const logger = createLogger("crawler");

export const fetchWithAxios: PageFetcher = async (url) => {
  const response = await axios.get<string>(url, {
    headers: { "User-Agent": USER_AGENT, Accept: "text/html,*/*;q=0.5" },
    timeout: REQUEST_TIMEOUT_MS,
    responseType: "text",
    maxRedirects: 5,
  });
  return response.data;
};

const stripFragment = (url: URL) => {
  const copy = new URL(url);
  copy.hash = "";
  return copy.toString();
};

/**
 * Breadth-first crawl of one host. Pages that fail to fetch are skipped with a
 * warning; the crawl stops after `maxPages` documents.
 */
export class WebCrawler implements DocumentSource {
  readonly kind = "web" as const;
  private readonly base: URL;
  private readonly fetchPage: PageFetcher;
  private readonly now: () => Date;

  constructor(private readonly options: WebCrawlerOptions) {
    this.base = new URL(options.url);
    this.fetchPage = options.fetchPage ?? fetchWithAxios;
    this.now = options.now ?? (() => new Date());
  }

  get label() {
    return this.options.url;
  }

  async *documents(): AsyncGenerator<SourceDocument> {
    const queue = [stripFragment(this.base)];
    const seen = new Set<string>();
    let emitted = 0;
    let requests = 0;

    while (queue.length > 0 && emitted < this.options.maxPages) {
      const url = queue.shift();
      if (url === undefined || seen.has(url)) {
        continue;
      }
      seen.add(url);

      if (requests > 0 && this.options.delay > 0) {
        await sleep(this.options.delay * 1000);
      }
      requests += 1;

      let html: string;
      try {
        html = await this.fetchPage(url);
      } catch (error) {
        logger.warn("Skipping page", { url, error: describeError(error) });
        continue;
      }

      const text = extractText(html);
      emitted += 1;
      logger.debug("Fetched page", { url, characters: text.length });

      yield {
        id: url,
        sourceKind: "web",
        origin: url,
        title: extractTitle(html) ?? url,
        fetchedAt: this.now().toISOString(),
        text,
      };

      for (const link of this.followLinks(url, html)) {
        if (!seen.has(link)) {
          queue.push(link);
        }
      }
    }
  }

  private followLinks(pageUrl: string, html: string): string[] {
    const allowedPaths = this.options.allowedPaths ?? [];
    const links: string[] = [];

    for (const href of extractLinks(html)) {
      let absolute: URL;
      try {
        absolute = new URL(href, pageUrl);
      } catch {
        continue;
      }

      if (absolute.protocol !== "http:" && absolute.protocol !== "https:") {
        continue;
      }
      if (absolute.host !== this.base.host) {
        continue;
      }
      if (
        allowedPaths.length > 0 &&
        !allowedPaths.some((prefix) => absolute.pathname.startsWith(prefix))
      ) {
        continue;
      }

      links.push(stripFragment(absolute));
    }

    return links;
  }
}

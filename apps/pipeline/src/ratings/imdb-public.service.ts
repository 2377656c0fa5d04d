import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { IMDB_BASE_URL, IMDB_REQUEST_TIMEOUT_MS } from '../app.constants';
import { errToMessage } from '../errors';
import { extractTitleLinkIds } from '../lib/imdb-id';

const PAGE_STEP = 100;

@Injectable()
export class ImdbPublicService {
  private readonly logger = new Logger(ImdbPublicService.name);

  buildRatingsPageUrl(userId: string, start: number): URL {
    const url = new URL(
      `${IMDB_BASE_URL}/user/${encodeURIComponent(userId)}/ratings`,
    );
    url.searchParams.set('sort', 'ratings_date,desc');
    url.searchParams.set('start', String(start));
    return url;
  }

  /**
   * Title ids from a user's public ratings pages. Stops at `maxPages`, on a
   * page without ids, or on a page that adds nothing new.
   */
  async loadUserRatingIds(userId: string, maxPages: number): Promise<Set<string>> {
    const id = userId.trim();
    const ids = new Set<string>();
    if (!id) return ids;

    let start = 1;
    for (let page = 0; page < maxPages; page += 1) {
      const html = await this.fetchPage(this.buildRatingsPageUrl(id, start));
      const found = extractTitleLinkIds(html);
      if (!found.size) break;

      const before = ids.size;
      for (const tt of found) ids.add(tt);
      if (ids.size === before) break;
      start += PAGE_STEP;
    }

    this.logger.debug(`IMDb public ratings user=${id} ids=${ids.size}`);
    return ids;
  }

  private async fetchPage(url: URL): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), IMDB_REQUEST_TIMEOUT_MS);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'text/html',
          'User-Agent': 'Mozilla/5.0 (compatible; daily-picks/1.0)',
        },
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new BadGatewayException(`IMDb request failed: HTTP ${res.status}`);
      }
      return await res.text();
    } catch (err) {
      if (err instanceof BadGatewayException) throw err;
      throw new BadGatewayException(`IMDb request failed: ${errToMessage(err)}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

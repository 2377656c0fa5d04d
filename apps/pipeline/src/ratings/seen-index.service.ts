import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorCode, errToMessage } from '../errors';
import { FS_OPS, type FsOps } from '../runs/fs-ops';
import { ImdbPublicService } from './imdb-public.service';
import { parseCsv } from './ratings-csv';
import type {
  SeenIndexLoader,
  SeenIndexLoadResult,
  SeenIndexQuery,
} from './ratings.types';
import { addRatingsRows, SeenIndex } from './seen-index';

@Injectable()
export class SeenIndexService implements SeenIndexLoader {
  private readonly logger = new Logger(SeenIndexService.name);

  constructor(
    @Inject(FS_OPS) private readonly fs: FsOps,
    private readonly imdbPublic: ImdbPublicService,
  ) {}

  /**
   * Ratings export (a missing file is an empty index) plus the user's public
   * ratings pages when `imdbUserId` is set. Only a CSV read error propagates.
   */
  async load(query: SeenIndexQuery): Promise<SeenIndexLoadResult> {
    const index = new SeenIndex();

    let csvFound = false;
    let csvRowsUsed = 0;
    const text = await this.readCsv(query.ratingsCsvPath);
    if (text !== null) {
      csvFound = true;
      csvRowsUsed = addRatingsRows(index, parseCsv(text));
    } else {
      this.logger.log(`No ratings export at ${query.ratingsCsvPath}`);
    }

    let publicIds = 0;
    let publicError: string | null = null;
    if (query.imdbUserId.trim()) {
      try {
        const ids = await this.imdbPublic.loadUserRatingIds(
          query.imdbUserId,
          query.imdbPublicMaxPages,
        );
        for (const id of ids) {
          if (index.addId(id)) publicIds += 1;
        }
      } catch (err) {
        publicError = errToMessage(err);
        this.logger.warn(`IMDb public ratings skipped: ${publicError}`);
      }
    }

    this.logger.log(
      `Seen index ready ids=${index.idCount} titles=${index.titleKeyCount}`,
    );
    return {
      index,
      sources: {
        csvPath: query.ratingsCsvPath,
        csvFound,
        csvRowsUsed,
        publicIds,
        publicError,
      },
    };
  }

  private async readCsv(path: string): Promise<string | null> {
    if (!path.trim()) return null;
    try {
      return await this.fs.readFile(path, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }
  }
}

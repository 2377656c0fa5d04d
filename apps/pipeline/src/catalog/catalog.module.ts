import { Module } from '@nestjs/common';
import { TmdbModule } from '../tmdb/tmdb.module';
import { TmdbService } from '../tmdb/tmdb.service';
import { CATALOG_PROVIDER } from './catalog.types';

@Module({
  imports: [TmdbModule],
  providers: [{ provide: CATALOG_PROVIDER, useExisting: TmdbService }],
  exports: [CATALOG_PROVIDER],
})
export class CatalogModule {}

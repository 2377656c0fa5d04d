import { Injectable, Logger } from '@nestjs/common';
import { readOptionsFile } from './options-file';
import {
  resolvePipelineOptions,
  type PipelineOptions,
  type RawSettings,
} from './pipeline-options';

export type ResolvedSettings = {
  options: PipelineOptions;
  /** Problems that made us fall back to env and defaults. */
  issues: string[];
};

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  /** Never throws: an unusable options file is reported in `issues`. */
  async resolve(env: NodeJS.ProcessEnv = process.env): Promise<ResolvedSettings> {
    const dataDir = env.APP_DATA_DIR?.trim() || 'data';
    const filePath = env.PIPELINE_CONFIG_FILE?.trim() ?? '';
    const issues: string[] = [];

    let file: RawSettings = {};
    if (filePath) {
      const res = await readOptionsFile(filePath);
      if (res.status === 'loaded') {
        file = res.settings;
        this.logger.debug(`Loaded options file ${filePath}`);
      } else if (res.status === 'missing') {
        this.logger.warn(
          `PIPELINE_CONFIG_FILE=${filePath} does not exist; using env/defaults only`,
        );
      } else {
        const issue = `options file ${filePath} ignored: ${res.error}`;
        issues.push(issue);
        this.logger.warn(`${issue}; using env/defaults only`);
      }
    }

    return { options: resolvePipelineOptions({ env, file, dataDir }), issues };
  }

  async resolveOptions(env: NodeJS.ProcessEnv = process.env): Promise<PipelineOptions> {
    return (await this.resolve(env)).options;
  }
}

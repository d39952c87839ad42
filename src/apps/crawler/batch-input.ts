import { promises as fs } from 'fs';
import * as path from 'path';
import * as Joi from 'joi';
import { ConfigurationError } from '@/shared/errors/crawl.errors';
import { errorMessage, normalizeEntityKey } from '@/shared/lib/util';
import { EntityRequest } from '@/shared/scraping/interfaces/acquisition.interface';
import { CrawlRunReport } from '@/shared/scraping/interfaces/crawl-result.interface';

const batchSchema = Joi.array<EntityRequest[]>().items(
  Joi.object({
    name: Joi.string()
      .trim()
      .min(1)
      .required()
      .custom((value: string, helpers) =>
        normalizeEntityKey(value) ? value : helpers.error('entity.noKey'),
      )
      .messages({ 'entity.noKey': '{{#label}} has no letters or digits' }),
    documentNumber: Joi.string().trim().allow(''),
    sourceUrl: Joi.string().uri({ scheme: ['http', 'https'] }),
  }),
);

export function parseBatch(raw: unknown): EntityRequest[] {
  const { error, value } = batchSchema.validate(raw, { abortEarly: false });
  if (error) {
    throw new ConfigurationError(`Invalid batch input: ${error.message}`);
  }
  return value;
}

export async function readBatch(inputPath: string): Promise<EntityRequest[]> {
  const resolved = path.resolve(process.cwd(), inputPath);
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read batch input ${resolved}: ${errorMessage(error)}`,
    );
  }
  return parseBatch(raw);
}

export async function writeReport(
  reportPath: string,
  report: CrawlRunReport,
): Promise<string> {
  const resolved = path.resolve(process.cwd(), reportPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, JSON.stringify(report, null, 2), 'utf-8');
  return resolved;
}

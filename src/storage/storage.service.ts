import { Injectable } from '@nestjs/common';
import * as path from 'path';
import * as fs from 'fs';
import { config } from '../config';
import { Dataset } from '../consumption/dto/consumption.dto';
import { datasetSchema } from './storage.schema';

export type ReadResult =
  | { status: 'loaded'; data: Dataset }
  | { status: 'missing' }
  | { status: 'malformed'; reason: string };

export type WriteResult =
  | { ok: true }
  | { ok: false; reason: string };

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

@Injectable()
export class StorageService {
  dataFilePath = path.resolve(config.dataFile);

  readDataset(): ReadResult {
    let raw: string;
    try {
      raw = fs.readFileSync(this.dataFilePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return { status: 'missing' };
      }
      return { status: 'malformed', reason: String(error) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { status: 'malformed', reason: String(error) };
    }

    const result = datasetSchema.safeParse(parsed);
    if (!result.success) {
      const reason = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return { status: 'malformed', reason };
    }
    return { status: 'loaded', data: result.data };
  }

  writeDataset(data: Dataset): WriteResult {
    try {
      fs.writeFileSync(this.dataFilePath, JSON.stringify(data, null, 2), 'utf8');
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: String(error) };
    }
  }
}

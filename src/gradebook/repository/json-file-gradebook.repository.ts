import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  emptyGradebookDocument,
  GradebookDocument,
} from '../interfaces/gradebook-document.interface';
import { GradebookDocumentError, GradebookPersistenceError } from '../errors/gradebook.errors';
import { GradebookRepository } from './gradebook.repository';
import { DocumentShapeError, parseGradebookDocument } from './gradebook-document.parser';

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export class JsonFileGradebookRepository implements GradebookRepository {
  private readonly logger = new Logger(JsonFileGradebookRepository.name);
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<GradebookDocument> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.log(`No gradebook at ${this.filePath}, starting empty`);
        return emptyGradebookDocument();
      }
      throw err;
    }

    try {
      return parseGradebookDocument(JSON.parse(text));
    } catch (err) {
      if (err instanceof SyntaxError || err instanceof DocumentShapeError) {
        throw new GradebookDocumentError(this.filePath, err.message);
      }
      throw err;
    }
  }

  // Atomic replace: write a sibling temp file, then rename it over the target
  async save(document: GradebookDocument): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (err) {
      throw new GradebookPersistenceError(this.filePath, err);
    }

    try {
      await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      await this.removeTempFile(tempPath);
      throw new GradebookPersistenceError(this.filePath, err);
    }
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (err) {
      this.logger.warn(`Could not remove ${tempPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

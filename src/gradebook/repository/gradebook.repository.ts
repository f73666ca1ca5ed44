import { GradebookDocument } from '../interfaces/gradebook-document.interface';

export const GRADEBOOK_REPOSITORY = 'GRADEBOOK_REPOSITORY';

export interface GradebookRepository {
  /** Full persisted document, or the empty document when nothing was saved yet. */
  load(): Promise<GradebookDocument>;
  /** Overwrites the persisted document; resolves only once the write is complete. */
  save(document: GradebookDocument): Promise<void>;
}

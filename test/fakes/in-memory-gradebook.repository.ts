import {
  emptyGradebookDocument,
  GradebookDocument,
} from '../../src/gradebook/interfaces/gradebook-document.interface';
import { GradebookRepository } from '../../src/gradebook/repository/gradebook.repository';
import { GradebookPersistenceError } from '../../src/gradebook/errors/gradebook.errors';

// Keeps the last saved document as JSON text so callers cannot alias it
export class InMemoryGradebookRepository implements GradebookRepository {
  saved: string;
  saveCount = 0;
  failNextSave = false;

  constructor(initial: GradebookDocument = emptyGradebookDocument()) {
    this.saved = JSON.stringify(initial);
  }

  async load(): Promise<GradebookDocument> {
    return JSON.parse(this.saved);
  }

  async save(document: GradebookDocument): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new GradebookPersistenceError('memory', new Error('disk full'));
    }
    this.saveCount++;
    this.saved = JSON.stringify(document);
  }

  get document(): GradebookDocument {
    return JSON.parse(this.saved);
  }
}

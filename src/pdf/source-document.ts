import { RawTable, SourceDocument, SourcePage } from '../edi/interfaces/edi.interfaces';

/**
 * Document entièrement matérialisé avant le parsing
 */
export class MaterializedSourceDocument implements SourceDocument {
  constructor(private readonly pages: SourcePage[]) {}

  static fromPages(pages: Array<Partial<SourcePage>>): MaterializedSourceDocument {
    return new MaterializedSourceDocument(
      pages.map((page) => ({ text: page.text ?? '', tables: page.tables ?? [] })),
    );
  }

  getPageCount(): number {
    return this.pages.length;
  }

  getPageText(index: number): string {
    return this.pages[index]?.text ?? '';
  }

  getPageTables(index: number): RawTable[] {
    return this.pages[index]?.tables ?? [];
  }
}

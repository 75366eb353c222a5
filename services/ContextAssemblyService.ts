import { AssembledContext, Citation, RetrievedChunk } from '../types';

export const UNKNOWN_DOCUMENT_TITLE = 'Unknown Document';

export class ContextAssemblyService {
  assemble(ranked: RetrievedChunk[], titles: ReadonlyMap<string, string>): AssembledContext {
    const sections: string[] = [];
    const citations: Citation[] = [];

    ranked.forEach((chunk, index) => {
      const documentTitle = titles.get(chunk.documentId) ?? UNKNOWN_DOCUMENT_TITLE;
      sections.push(
        `--- Source ${index + 1}: ${documentTitle} (pages ${chunk.pageStart + 1}-${chunk.pageEnd + 1}) ---\n` +
          `${chunk.text}\n\n`
      );
      citations.push({
        chunkId: chunk.id,
        documentTitle,
        pageStart: chunk.pageStart,
        pageEnd: chunk.pageEnd
      });
    });

    return { context: sections.join(''), citations };
  }
}

import { z } from 'zod'
import type { Collection } from '../repository/types.js'
import { tool, type PipelineTool } from './tool.js'

const MAX_RESULTS = 5

/**
 * Creates the `file-search` tool over the given indexed collections.
 *
 * Files behind the returned chunks are recorded on the draft as citations.
 *
 * @param collections - Indexed collections, as returned by `getCollectionsForSearch`
 * @returns The tool
 */
export function createCollectionSearchTool(collections: readonly Collection[]): PipelineTool {
  const collectionIds = collections.map((collection) => collection.id)
  const names = collections.map((collection) => collection.name).join(', ')
  return tool({
    name: 'file-search',
    description: `Search the knowledge base (${names}) for passages relevant to a query.`,
    inputSchema: z.object({
      query: z.string().min(1).describe('What to search for'),
    }),
    callback: async ({ query }, { repository, draft }) => {
      const hits = await repository.searchCollections(collectionIds, query, MAX_RESULTS)
      if (hits.length === 0) {
        return 'No results found.'
      }
      for (const hit of hits) {
        draft.citedFileIds.add(hit.fileId)
      }
      return hits.map((hit) => `<file id="${hit.fileId}" name="${hit.fileName}">\n${hit.content}\n</file>`).join('\n')
    },
  })
}

import { Client, collectPaginatedAPI } from '@notionhq/client';

export type QueryFilter = NonNullable<Parameters<Client['databases']['query']>[0]['filter']>;
export type CreateProperties = Parameters<Client['pages']['create']>[0]['properties'];
export type UpdateProperties = NonNullable<Parameters<Client['pages']['update']>[0]['properties']>;

export const NOTION_GATEWAY = Symbol('NOTION_GATEWAY');

/**
 * The slice of the Notion API the bot uses. Responses are left as `unknown`
 * and validated by NotionService.
 */
export interface NotionGateway {
  queryDatabase(databaseId: string, filter: QueryFilter): Promise<unknown[]>;
  retrievePage(pageId: string): Promise<unknown>;
  createPage(databaseId: string, properties: CreateProperties): Promise<unknown>;
  updatePage(pageId: string, properties: UpdateProperties): Promise<unknown>;
}

export function createNotionGateway(client: Client): NotionGateway {
  return {
    queryDatabase: (databaseId, filter) =>
      collectPaginatedAPI(client.databases.query, {
        database_id: databaseId,
        filter,
      }),
    retrievePage: (pageId) => client.pages.retrieve({ page_id: pageId }),
    createPage: (databaseId, properties) =>
      client.pages.create({
        parent: { database_id: databaseId },
        properties,
      }),
    updatePage: (pageId, properties) =>
      client.pages.update({ page_id: pageId, properties }),
  };
}

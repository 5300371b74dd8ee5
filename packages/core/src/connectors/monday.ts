import { z } from 'zod';
import { logger } from '../logger/index.js';
import { parseDate, toNumber } from '../data/coerce.js';
import { UNKNOWN, type Deal } from '../data/types.js';
import { requestJson, type FetchFn } from './http.js';
import { ConnectorError } from './errors.js';

export const MONDAY_API_URL = 'https://api.monday.com/v2';
export const MONDAY_PAGE_LIMIT = 100;

const MondayItemSchema = z.object({
    name: z.string(),
    column_values: z.array(
        z.object({
            id: z.string(),
            text: z.string().nullable().optional(),
        })
    ),
});

const MondayResponseSchema = z.object({
    data: z.object({
        boards: z.array(
            z.object({
                items_page: z.object({
                    items: z.array(MondayItemSchema),
                }),
            })
        ),
    }),
});

export type MondayItem = z.infer<typeof MondayItemSchema>;

export interface MondayClientOptions {
    token: string;
    boardId: string;
    timeoutMs: number;
    fetch?: FetchFn;
}

export function buildDealsQuery(boardId: string): string {
    return `{
  boards (ids: ${boardId}) {
    items_page(limit: ${MONDAY_PAGE_LIMIT}) {
      items {
        name
        column_values {
          id
          text
        }
      }
    }
  }
}`;
}

/**
 * Flatten a board item into a deal. Column ids on the board are expected to be
 * `team`, `close_date`, `deal_value` and `cost_to_deliver`; other columns are ignored.
 */
export function mapMondayItem(item: MondayItem): Deal {
    const columns = new Map<string, string | null>();
    for (const column of item.column_values) {
        columns.set(column.id, column.text ?? null);
    }

    const team = columns.get('team');
    return {
        dealName: item.name,
        team: team && team.trim() !== '' ? team : UNKNOWN,
        closeDate: parseDate(columns.get('close_date')),
        dealValue: toNumber(columns.get('deal_value')),
        costToDeliver: toNumber(columns.get('cost_to_deliver')),
    };
}

/**
 * Reads deals from a monday.com board through the GraphQL API.
 */
export class MondayClient {
    constructor(private readonly options: MondayClientOptions) {}

    async fetchDeals(): Promise<Deal[]> {
        const response = await requestJson(
            'monday',
            MONDAY_API_URL,
            {
                method: 'POST',
                headers: {
                    Authorization: this.options.token,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({ query: buildDealsQuery(this.options.boardId) }),
            },
            MondayResponseSchema,
            { timeoutMs: this.options.timeoutMs, fetch: this.options.fetch }
        );

        const board = response.data.boards[0];
        if (!board) {
            throw ConnectorError.boardNotFound(this.options.boardId);
        }

        const deals = board.items_page.items.map(mapMondayItem);
        logger.debug(`monday: loaded ${deals.length} deals from board ${this.options.boardId}`);
        return deals;
    }
}

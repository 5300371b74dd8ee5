import { z } from 'zod';

// Unset and blank variables both mean "not configured"
const OptionalSecret = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Credentials and request settings for the three upstream APIs.
 * Every credential is optional: without all three tokens the connector serves demo data.
 */
export const ConnectorConfigSchema = z
    .object({
        mondayToken: OptionalSecret.describe('monday.com API token'),
        mondayBoardId: z
            .string()
            .regex(/^\d+$/, 'monday board id must be numeric')
            .default('1234567890')
            .describe('monday.com board holding the deals'),
        harvestToken: OptionalSecret.describe('Harvest personal access token'),
        harvestAccountId: OptionalSecret.describe('Harvest account id'),
        xeroToken: OptionalSecret.describe('Xero OAuth access token'),
        xeroTenantId: OptionalSecret.describe('Xero tenant id'),
        timeoutMs: z.coerce
            .number()
            .int()
            .positive()
            .default(20_000)
            .describe('Per-request timeout in milliseconds'),
    })
    .strict();

export type ConnectorConfig = z.output<typeof ConnectorConfigSchema>;
export type ConnectorConfigInput = z.input<typeof ConnectorConfigSchema>;

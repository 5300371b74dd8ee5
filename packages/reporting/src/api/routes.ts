import { OpenAPIHono, createRoute, z } from '@hono/zod-openapi';
import { TeamTargetsUpdateSchema, TeamTargetsSchema } from '../targets/schemas.js';
import type { ReportService } from './report-service.js';
import {
    BillingQuerySchema,
    DealProfitRowSchema,
    HealthResponseSchema,
    MonthlyBillingRowSchema,
    RawTableParamSchema,
    RawTableQuerySchema,
    ScorecardRowSchema,
    SummarySchema,
    TargetsMapSchema,
    TeamParamSchema,
    TeamTimeRowSchema,
    YearlyBillingRowSchema,
    RawRowsSchema,
    okResponse,
} from './schemas.js';
import { throwOnInvalid } from './validation.js';

function jsonContent<T extends z.ZodTypeAny>(schema: T, description: string) {
    return { description, content: { 'application/json': { schema } } };
}

export function createHealthRouter(service: ReportService) {
    const app = new OpenAPIHono({ defaultHook: throwOnInvalid });

    const route = createRoute({
        method: 'get',
        path: '/',
        tags: ['system'],
        responses: { 200: jsonContent(HealthResponseSchema, 'Dataset status') },
    });
    app.openapi(route, async (ctx) => {
        const status = await service.status();
        return ctx.json({ ok: true, ...status }, 200);
    });

    return app;
}

/**
 * Report, targets and raw data endpoints. Mounted under /api.
 */
export function createReportingRouter(service: ReportService) {
    const app = new OpenAPIHono({ defaultHook: throwOnInvalid });

    const summaryRoute = createRoute({
        method: 'get',
        path: '/summary',
        summary: 'Headline metrics',
        tags: ['reports'],
        responses: { 200: jsonContent(okResponse(SummarySchema), 'Summary metrics') },
    });

    const billingRoute = createRoute({
        method: 'get',
        path: '/billing',
        summary: 'Billing by month or year',
        tags: ['reports'],
        request: { query: BillingQuerySchema },
        responses: {
            200: jsonContent(
                okResponse(
                    z.object({
                        period: z.enum(['month', 'year']),
                        rows: z.array(z.union([MonthlyBillingRowSchema, YearlyBillingRowSchema])),
                    })
                ),
                'Billing rows, oldest first'
            ),
        },
    });

    const timeRoute = createRoute({
        method: 'get',
        path: '/time-by-team',
        summary: 'Hours recorded per team',
        tags: ['reports'],
        responses: { 200: jsonContent(okResponse(z.array(TeamTimeRowSchema)), 'Hours per team') },
    });

    const profitabilityRoute = createRoute({
        method: 'get',
        path: '/profitability',
        summary: 'Deal profitability',
        tags: ['reports'],
        responses: {
            200: jsonContent(okResponse(z.array(DealProfitRowSchema)), 'Deals by profit'),
        },
    });

    const scorecardRoute = createRoute({
        method: 'get',
        path: '/scorecard',
        summary: 'Team scorecard',
        description: 'Per-team performance measured against the stored targets',
        tags: ['reports'],
        responses: {
            200: jsonContent(okResponse(z.array(ScorecardRowSchema)), 'Scorecard rows'),
        },
    });

    const teamsRoute = createRoute({
        method: 'get',
        path: '/teams',
        summary: 'Known teams',
        tags: ['reports'],
        responses: { 200: jsonContent(okResponse(z.array(z.string())), 'Team names') },
    });

    const getTargetsRoute = createRoute({
        method: 'get',
        path: '/targets',
        summary: 'Resolved targets',
        tags: ['targets'],
        responses: { 200: jsonContent(okResponse(TargetsMapSchema), 'Targets per team') },
    });

    const putTargetsRoute = createRoute({
        method: 'put',
        path: '/targets/{team}',
        summary: 'Update team targets',
        tags: ['targets'],
        request: {
            params: TeamParamSchema,
            body: {
                content: { 'application/json': { schema: TeamTargetsUpdateSchema } },
                required: true,
            },
        },
        responses: { 200: jsonContent(okResponse(TeamTargetsSchema), 'Updated targets') },
    });

    const rawRoute = createRoute({
        method: 'get',
        path: '/raw/{table}',
        summary: 'Raw table preview',
        tags: ['data'],
        request: { params: RawTableParamSchema, query: RawTableQuerySchema },
        responses: { 200: jsonContent(okResponse(RawRowsSchema), 'First rows') },
    });

    const refreshRoute = createRoute({
        method: 'post',
        path: '/refresh',
        summary: 'Reload data',
        description: 'Reloads the dataset through the connectors',
        tags: ['data'],
        responses: { 200: jsonContent(HealthResponseSchema, 'Status after reload') },
    });

    return app
        .openapi(summaryRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.summary() }, 200)
        )
        .openapi(billingRoute, async (ctx) => {
            const { period } = ctx.req.valid('query');
            const rows = await service.billing(period);
            return ctx.json({ ok: true, data: { period, rows } }, 200);
        })
        .openapi(timeRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.timeByTeam() }, 200)
        )
        .openapi(profitabilityRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.profitability() }, 200)
        )
        .openapi(scorecardRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.scorecard() }, 200)
        )
        .openapi(teamsRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.teams() }, 200)
        )
        .openapi(getTargetsRoute, async (ctx) =>
            ctx.json({ ok: true, data: await service.resolvedTargets() }, 200)
        )
        .openapi(putTargetsRoute, async (ctx) => {
            const { team } = ctx.req.valid('param');
            const updated = await service.updateTargets(team, ctx.req.valid('json'));
            return ctx.json({ ok: true, data: updated }, 200);
        })
        .openapi(rawRoute, async (ctx) => {
            const { table } = ctx.req.valid('param');
            const { limit } = ctx.req.valid('query');
            return ctx.json({ ok: true, data: await service.rawTable(table, limit) }, 200);
        })
        .openapi(refreshRoute, async (ctx) => {
            await service.refresh();
            const status = await service.status();
            return ctx.json({ ok: true, ...status }, 200);
        });
}

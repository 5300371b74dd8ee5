import { useState, useEffect, useCallback } from 'react';
import type {
    ApiErrorBody,
    ApiResponse,
    BillingResponse,
    DealProfitRow,
    HealthStatus,
    MonthlyBillingRow,
    RawTable,
    ScorecardRow,
    Summary,
    TeamTargets,
    TeamTargetsUpdate,
    TeamTimeRow,
    YearlyBillingRow,
} from './types.js';

const API_URL = '/api';

function isApiErrorBody(value: unknown): value is ApiErrorBody {
    return (
        typeof value === 'object' &&
        value !== null &&
        'message' in value &&
        typeof value.message === 'string'
    );
}

async function requestJson<T>(url: string, init?: RequestInit): Promise<T> {
    const response = await fetch(url, init);
    const json = await response.json().catch(() => null);

    if (!response.ok) {
        const detail = isApiErrorBody(json) ? json.message : `status ${response.status}`;
        throw new Error(`Request failed: ${detail}`);
    }
    return json;
}

// Generic fetch hook; bump `reloadKey` to fetch again
function useFetch<T>(url: string | null, reloadKey: number = 0) {
    const [data, setData] = useState<T | null>(null);
    const [loading, setLoading] = useState(true);
    const [error, setError] = useState<Error | null>(null);

    const fetchData = useCallback(async () => {
        if (!url) {
            setLoading(false);
            return;
        }

        try {
            setLoading(true);
            setError(null);
            setData(await requestJson<T>(url));
        } catch (err) {
            setError(err instanceof Error ? err : new Error('Unknown error'));
        } finally {
            setLoading(false);
        }
    }, [url, reloadKey]);

    useEffect(() => {
        void fetchData();
    }, [fetchData]);

    return { data, loading, error, refetch: fetchData };
}

export function useHealth(reloadKey?: number) {
    return useFetch<HealthStatus>('/health', reloadKey);
}

export function useSummary(reloadKey?: number) {
    return useFetch<ApiResponse<Summary>>(`${API_URL}/summary`, reloadKey);
}

export function useMonthlyBilling(reloadKey?: number) {
    return useFetch<ApiResponse<BillingResponse<MonthlyBillingRow>>>(
        `${API_URL}/billing?period=month`,
        reloadKey
    );
}

export function useYearlyBilling(reloadKey?: number) {
    return useFetch<ApiResponse<BillingResponse<YearlyBillingRow>>>(
        `${API_URL}/billing?period=year`,
        reloadKey
    );
}

export function useTimeByTeam(reloadKey?: number) {
    return useFetch<ApiResponse<TeamTimeRow[]>>(`${API_URL}/time-by-team`, reloadKey);
}

export function useProfitability(reloadKey?: number) {
    return useFetch<ApiResponse<DealProfitRow[]>>(`${API_URL}/profitability`, reloadKey);
}

export function useScorecard(reloadKey?: number) {
    return useFetch<ApiResponse<ScorecardRow[]>>(`${API_URL}/scorecard`, reloadKey);
}

export function useTargets(reloadKey?: number) {
    return useFetch<ApiResponse<Record<string, TeamTargets>>>(`${API_URL}/targets`, reloadKey);
}

// Row type is chosen by the caller to match `table`
export function useRawTable<Row>(table: RawTable | null, limit: number, reloadKey?: number) {
    const url = table ? `${API_URL}/raw/${table}?limit=${limit}` : null;
    return useFetch<ApiResponse<Row[]>>(url, reloadKey);
}

export async function updateTeamTargets(
    team: string,
    update: TeamTargetsUpdate
): Promise<TeamTargets> {
    const body = await requestJson<ApiResponse<TeamTargets>>(
        `${API_URL}/targets/${encodeURIComponent(team)}`,
        {
            method: 'PUT',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(update),
        }
    );
    return body.data;
}

export async function refreshDataset(): Promise<HealthStatus> {
    return requestJson<HealthStatus>(`${API_URL}/refresh`, { method: 'POST' });
}

export function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export function headersOf(init: RequestInit | undefined): Headers {
    return new Headers(init?.headers);
}

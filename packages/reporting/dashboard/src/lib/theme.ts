/**
 * Colour tokens shared by the charts and cards
 */

export const colors = {
    brand: {
        300: '#93c5fd',
        500: '#3b82f6',
        700: '#1d4ed8',
    },

    status: {
        success: '#22c55e',
        warning: '#f59e0b',
        error: '#ef4444',
    },

    violet: '#8b5cf6',
    teal: '#14b8a6',
    pink: '#ec4899',

    gray: {
        200: '#e5e7eb',
        400: '#9ca3af',
        500: '#6b7280',
    },
};

// Recharts theme colors
export const chartColors = {
    billed: colors.brand[500],
    collected: colors.status.success,
    outstanding: colors.status.warning,
    grid: colors.gray[200],
    axis: colors.gray[400],
    tick: colors.gray[500],

    // Multi-series colors
    series: [
        colors.brand[500],
        colors.status.success,
        colors.violet,
        colors.status.warning,
        colors.pink,
        colors.teal,
        colors.status.error,
        colors.brand[700],
    ],
};

export const tooltipStyle = {
    backgroundColor: 'white',
    border: `1px solid ${colors.gray[200]}`,
    borderRadius: '8px',
    padding: '8px 12px',
    fontSize: '12px',
};

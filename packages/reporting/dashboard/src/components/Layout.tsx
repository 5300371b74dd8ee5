import React from 'react';
import { motion } from 'framer-motion';
import { RefreshCw } from 'lucide-react';
import { describeDataset } from '../lib/utils.js';
import type { HealthStatus, Summary } from '../lib/types.js';

function SourceBadge({ summary }: { summary: Summary }) {
    const live = summary.source === 'live';
    return (
        <span
            title={summary.fallbackReason}
            className={`rounded-full px-3 py-1 text-xs font-medium ${
                live ? 'bg-green-100 text-green-700' : 'bg-amber-100 text-amber-700'
            }`}
        >
            {live ? 'Live data' : 'Demo data'}
        </span>
    );
}

interface DashboardHeaderProps {
    summary?: Summary;
    health?: HealthStatus;
    refreshing: boolean;
    onRefresh: () => void;
}

/**
 * Sticky bar with the dataset source, row counts and the refresh action
 */
function DashboardHeader({ summary, health, refreshing, onRefresh }: DashboardHeaderProps) {
    return (
        <header className="sticky top-0 z-10 border-b border-gray-200 bg-white/90 backdrop-blur">
            <div className="max-w-7xl mx-auto flex items-center justify-between gap-6 px-6 py-4">
                <div>
                    <h1 className="text-2xl font-bold text-gray-900">Pulseboard</h1>
                    <p className="text-sm text-gray-600">
                        Billing, collections, time and deal profitability across teams
                    </p>
                </div>
                <div className="flex items-center gap-3">
                    {summary && <SourceBadge summary={summary} />}
                    {health && (
                        <span className="text-xs text-gray-500">{describeDataset(health)}</span>
                    )}
                    <button
                        type="button"
                        disabled={refreshing}
                        onClick={onRefresh}
                        className="inline-flex items-center gap-2 rounded-md border border-gray-300 bg-white px-3 py-2 text-sm font-medium text-gray-700 hover:bg-gray-50 disabled:opacity-50"
                    >
                        <RefreshCw className={`w-4 h-4 ${refreshing ? 'animate-spin' : ''}`} />
                        Refresh
                    </button>
                </div>
            </div>
        </header>
    );
}

interface LayoutProps extends DashboardHeaderProps {
    children: React.ReactNode;
}

export function Layout({ children, ...header }: LayoutProps) {
    return (
        <div className="min-h-screen bg-gray-50">
            <DashboardHeader {...header} />
            <motion.main
                initial={{ opacity: 0, y: 8 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.3 }}
                className="max-w-7xl mx-auto px-6 py-8"
            >
                {children}
            </motion.main>
        </div>
    );
}

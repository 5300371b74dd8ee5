import React from 'react';
import { motion } from 'framer-motion';

interface StatCardProps {
    label: string;
    value: string;
    hint?: string;
    icon?: React.ReactNode;
    className?: string;
}

export function StatCard({ label, value, hint, icon, className = '' }: StatCardProps) {
    return (
        <motion.div
            initial={{ opacity: 0, y: 8 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.25 }}
            className={`bg-white rounded-lg border border-gray-200 shadow-sm p-6 ${className}`}
        >
            <div className="flex items-start justify-between">
                <div className="flex-1">
                    <p className="text-sm font-medium text-gray-600">{label}</p>
                    <p className="mt-2 text-3xl font-semibold text-gray-900">{value}</p>
                    {hint && <p className="mt-2 text-sm text-gray-500">{hint}</p>}
                </div>
                {icon && <div className="flex-shrink-0 text-gray-400">{icon}</div>}
            </div>
        </motion.div>
    );
}

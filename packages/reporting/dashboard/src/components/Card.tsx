import React from 'react';

interface CardProps {
    title?: string;
    description?: string;
    actions?: React.ReactNode;
    children: React.ReactNode;
    className?: string;
}

export function Card({ title, description, actions, children, className = '' }: CardProps) {
    return (
        <section className={`bg-white rounded-lg border border-gray-200 shadow-sm ${className}`}>
            {title && (
                <div className="px-6 py-4 border-b border-gray-200 flex items-start justify-between">
                    <div>
                        <h3 className="text-lg font-semibold text-gray-900">{title}</h3>
                        {description && (
                            <p className="mt-1 text-sm text-gray-500">{description}</p>
                        )}
                    </div>
                    {actions && <div className="flex gap-2">{actions}</div>}
                </div>
            )}
            <div className="px-6 py-4">{children}</div>
        </section>
    );
}

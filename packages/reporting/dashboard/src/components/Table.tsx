import React from 'react';

export interface Column<T> {
    header: string;
    accessor: keyof T | ((row: T) => React.ReactNode);
    align?: 'left' | 'right';
}

interface TableProps<T> {
    data: T[];
    columns: Column<T>[];
    rowKey: (row: T, index: number) => string;
    className?: string;
}

function renderCell<T>(row: T, accessor: Column<T>['accessor']): React.ReactNode {
    if (typeof accessor === 'function') {
        return accessor(row);
    }
    const value = row[accessor];
    return value === null || value === undefined ? '' : String(value);
}

export function Table<T>({ data, columns, rowKey, className = '' }: TableProps<T>) {
    return (
        <div className={`overflow-x-auto ${className}`}>
            <table className="min-w-full divide-y divide-gray-200">
                <thead className="bg-gray-50">
                    <tr>
                        {columns.map((column) => (
                            <th
                                key={column.header}
                                className={`px-4 py-3 text-xs font-medium text-gray-500 uppercase tracking-wider ${
                                    column.align === 'right' ? 'text-right' : 'text-left'
                                }`}
                            >
                                {column.header}
                            </th>
                        ))}
                    </tr>
                </thead>
                <tbody className="bg-white divide-y divide-gray-200">
                    {data.map((row, rowIdx) => (
                        <tr key={rowKey(row, rowIdx)} className="hover:bg-gray-50">
                            {columns.map((column) => (
                                <td
                                    key={column.header}
                                    className={`px-4 py-3 whitespace-nowrap text-sm text-gray-900 ${
                                        column.align === 'right' ? 'text-right tabular-nums' : ''
                                    }`}
                                >
                                    {renderCell(row, column.accessor)}
                                </td>
                            ))}
                        </tr>
                    ))}
                </tbody>
            </table>
            {data.length === 0 && (
                <div className="text-center py-12 text-gray-500">No data available</div>
            )}
        </div>
    );
}

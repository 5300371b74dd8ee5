import { useState } from 'react';
import { useRawTable } from '../lib/hooks.js';
import { formatCurrency } from '../lib/utils.js';
import { Table, type Column } from './Table.js';
import { ErrorState, Loading } from './Loading.js';
import type { Deal, Invoice, RawTable, TimeEntry } from '../lib/types.js';

const PREVIEW_LIMIT = 100;

const dealColumns: Column<Deal>[] = [
    { header: 'Deal', accessor: 'dealName' },
    { header: 'Team', accessor: 'team' },
    { header: 'Close date', accessor: 'closeDate' },
    { header: 'Value', accessor: (row) => formatCurrency(row.dealValue), align: 'right' },
    { header: 'Cost', accessor: (row) => formatCurrency(row.costToDeliver), align: 'right' },
];

const timeEntryColumns: Column<TimeEntry>[] = [
    { header: 'Date', accessor: 'date' },
    { header: 'Team', accessor: 'team' },
    { header: 'Project', accessor: 'project' },
    { header: 'Client', accessor: 'client' },
    { header: 'Hours', accessor: 'hours', align: 'right' },
    { header: 'Billable', accessor: (row) => (row.billable ? 'Yes' : 'No') },
    { header: 'Amount', accessor: (row) => formatCurrency(row.billableAmount), align: 'right' },
];

const invoiceColumns: Column<Invoice>[] = [
    { header: 'Invoice', accessor: 'invoiceNumber' },
    { header: 'Contact', accessor: 'contact' },
    { header: 'Status', accessor: 'status' },
    { header: 'Date', accessor: 'date' },
    { header: 'Due', accessor: 'dueDate' },
    { header: 'Total', accessor: (row) => formatCurrency(row.total), align: 'right' },
    { header: 'Paid', accessor: (row) => formatCurrency(row.amountPaid), align: 'right' },
    { header: 'Outstanding', accessor: (row) => formatCurrency(row.amountDue), align: 'right' },
];

const TABLE_LABELS: Record<RawTable, string> = {
    deals: 'Deals',
    'time-entries': 'Time entries',
    invoices: 'Invoices',
};

const RAW_TABLE_NAMES: RawTable[] = ['deals', 'time-entries', 'invoices'];

function RawTableView<Row>({
    table,
    columns,
    reloadKey,
}: {
    table: RawTable;
    columns: Column<Row>[];
    reloadKey: number;
}) {
    const { data, loading, error } = useRawTable<Row>(table, PREVIEW_LIMIT, reloadKey);

    if (loading) return <Loading text={`Loading ${TABLE_LABELS[table].toLowerCase()}...`} />;
    if (error) return <ErrorState error={error} />;
    return (
        <Table data={data?.data ?? []} columns={columns} rowKey={(_row, index) => String(index)} />
    );
}

/**
 * Collapsible preview of the first rows of each source table
 */
export function RawDataPanel({ reloadKey }: { reloadKey: number }) {
    const [visible, setVisible] = useState(false);
    const [table, setTable] = useState<RawTable>('deals');

    return (
        <div className="space-y-4">
            <label className="inline-flex items-center gap-2 text-sm font-medium text-gray-700">
                <input
                    type="checkbox"
                    checked={visible}
                    onChange={(event) => setVisible(event.target.checked)}
                />
                Show raw data
            </label>

            {visible && (
                <>
                    <div className="flex gap-2">
                        {RAW_TABLE_NAMES.map((name) => (
                            <button
                                key={name}
                                type="button"
                                onClick={() => setTable(name)}
                                className={`rounded-md px-3 py-1.5 text-sm font-medium ${
                                    table === name
                                        ? 'bg-blue-600 text-white'
                                        : 'bg-gray-100 text-gray-700 hover:bg-gray-200'
                                }`}
                            >
                                {TABLE_LABELS[name]}
                            </button>
                        ))}
                    </div>
                    <p className="text-xs text-gray-500">First {PREVIEW_LIMIT} rows</p>
                    {table === 'deals' && (
                        <RawTableView<Deal>
                            table="deals"
                            columns={dealColumns}
                            reloadKey={reloadKey}
                        />
                    )}
                    {table === 'time-entries' && (
                        <RawTableView<TimeEntry>
                            table="time-entries"
                            columns={timeEntryColumns}
                            reloadKey={reloadKey}
                        />
                    )}
                    {table === 'invoices' && (
                        <RawTableView<Invoice>
                            table="invoices"
                            columns={invoiceColumns}
                            reloadKey={reloadKey}
                        />
                    )}
                </>
            )}
        </div>
    );
}

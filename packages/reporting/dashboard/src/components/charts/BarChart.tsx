import {
    BarChart as RechartsBarChart,
    Bar,
    XAxis,
    YAxis,
    CartesianGrid,
    Tooltip,
    ResponsiveContainer,
    Legend,
} from 'recharts';
import { chartColors, tooltipStyle } from '../../lib/theme.js';
import type { ChartValue } from '../../lib/utils.js';

interface BarChartProps<T extends object> {
    data: T[];
    dataKeys: { key: keyof T & string; name: string; color?: string }[];
    xKey: keyof T & string;
    height?: number;
    showGrid?: boolean;
    showLegend?: boolean;
    formatYAxis?: (value: number) => string;
    formatTooltip?: (value: ChartValue) => string;
}

/**
 * Grouped vertical bars, one bar per data key
 */
export function BarChart<T extends object>({
    data,
    dataKeys,
    xKey,
    height = 300,
    showGrid = true,
    showLegend = true,
    formatYAxis,
    formatTooltip,
}: BarChartProps<T>) {
    return (
        <ResponsiveContainer width="100%" height={height}>
            <RechartsBarChart data={data} margin={{ top: 5, right: 30, left: 20, bottom: 5 }}>
                {showGrid && <CartesianGrid strokeDasharray="3 3" stroke={chartColors.grid} />}
                <XAxis
                    dataKey={xKey}
                    tick={{ fontSize: 12, fill: chartColors.tick }}
                    stroke={chartColors.axis}
                />
                <YAxis
                    tick={{ fontSize: 12, fill: chartColors.tick }}
                    tickFormatter={formatYAxis}
                    stroke={chartColors.axis}
                />
                <Tooltip contentStyle={tooltipStyle} formatter={formatTooltip} />
                {showLegend && <Legend />}
                {dataKeys.map((item, index) => (
                    <Bar
                        key={item.key}
                        dataKey={item.key}
                        name={item.name}
                        fill={item.color ?? chartColors.series[index % chartColors.series.length]}
                        radius={[4, 4, 0, 0]}
                    />
                ))}
            </RechartsBarChart>
        </ResponsiveContainer>
    );
}

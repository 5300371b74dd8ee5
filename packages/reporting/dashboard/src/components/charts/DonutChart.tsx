import { PieChart, Pie, Cell, Tooltip, ResponsiveContainer, Legend } from 'recharts';
import { chartColors, tooltipStyle } from '../../lib/theme.js';
import type { ChartValue } from '../../lib/utils.js';

interface DonutChartProps {
    data: { name: string; value: number }[];
    height?: number;
    showLegend?: boolean;
    colors?: string[];
    formatTooltip?: (value: ChartValue) => string;
}

export function DonutChart({
    data,
    height = 300,
    showLegend = true,
    colors = chartColors.series,
    formatTooltip,
}: DonutChartProps) {
    return (
        <ResponsiveContainer width="100%" height={height}>
            <PieChart>
                <Pie
                    data={data}
                    cx="50%"
                    cy="50%"
                    innerRadius={60}
                    outerRadius={100}
                    paddingAngle={2}
                    dataKey="value"
                    nameKey="name"
                >
                    {data.map((entry, index) => (
                        <Cell key={entry.name} fill={colors[index % colors.length]} />
                    ))}
                </Pie>
                <Tooltip contentStyle={tooltipStyle} formatter={formatTooltip} />
                {showLegend && <Legend />}
            </PieChart>
        </ResponsiveContainer>
    );
}

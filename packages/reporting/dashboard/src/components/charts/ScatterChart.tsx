import {
    ScatterChart as RechartsScatterChart,
    Scatter,
    XAxis,
    YAxis,
    ZAxis,
    CartesianGrid,
    Tooltip,
    ResponsiveContainer,
    Legend,
} from 'recharts';
import { chartColors, tooltipStyle } from '../../lib/theme.js';
import { formatChartCurrency, formatNumber, type DealPoint } from '../../lib/utils.js';

interface ScatterChartProps {
    series: { team: string; points: DealPoint[] }[];
    height?: number;
}

/**
 * Deal value against profit, one colour per team, sized by cost to deliver
 */
export function ScatterChart({ series, height = 320 }: ScatterChartProps) {
    return (
        <ResponsiveContainer width="100%" height={height}>
            <RechartsScatterChart margin={{ top: 10, right: 30, left: 20, bottom: 10 }}>
                <CartesianGrid strokeDasharray="3 3" stroke={chartColors.grid} />
                <XAxis
                    type="number"
                    dataKey="dealValue"
                    name="Deal value"
                    tick={{ fontSize: 12, fill: chartColors.tick }}
                    tickFormatter={formatNumber}
                    stroke={chartColors.axis}
                />
                <YAxis
                    type="number"
                    dataKey="profit"
                    name="Profit"
                    tick={{ fontSize: 12, fill: chartColors.tick }}
                    tickFormatter={formatNumber}
                    stroke={chartColors.axis}
                />
                <ZAxis
                    type="number"
                    dataKey="costToDeliver"
                    name="Cost to deliver"
                    range={[40, 400]}
                />
                <Tooltip
                    contentStyle={tooltipStyle}
                    cursor={{ strokeDasharray: '3 3' }}
                    formatter={formatChartCurrency}
                />
                <Legend />
                {series.map((item, index) => (
                    <Scatter
                        key={item.team}
                        name={item.team}
                        data={item.points}
                        fill={chartColors.series[index % chartColors.series.length]}
                    />
                ))}
            </RechartsScatterChart>
        </ResponsiveContainer>
    );
}

/**
 * Figure categories a classifier may assign
 */
export const FigureType = {
  LINE_CHART: 'line_chart',
  MULTI_LINE_CHART: 'multi_line_chart',
  AREA_CHART: 'area_chart',
  BAR_CHART: 'bar_chart',
  STACKED_BAR_CHART: 'stacked_bar_chart',
  PIE_CHART: 'pie_chart',
  DONUT_CHART: 'donut_chart',
  SCATTER_CHART: 'scatter_chart',
  BUBBLE_CHART: 'bubble_chart',
  BOX_WHISKER: 'box_whisker',
  WATERFALL: 'waterfall',
  HEATMAP: 'heatmap',
  CANDLESTICK: 'candlestick',
  HISTOGRAM: 'histogram',
  NETWORK_GRAPH: 'network_graph',
  PARALLEL_COORDINATES: 'parallel_coordinates',
  PHOTO: 'photo',
  DIAGRAM: 'diagram',
  LOGO: 'logo',
  UNKNOWN: 'unknown',
} as const;

export type FigureType = (typeof FigureType)[keyof typeof FigureType];

/**
 * Data table read back from a chart
 *
 * @interface ChartSeries
 */
export interface ChartSeries {
  columns: string[];
  rows: string[][];
}

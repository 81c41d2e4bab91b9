/**
 * Upper bounds shared by the environment schema and the tool input schemas,
 * so a configured default can never fail its own tool's validation
 */

export const MAX_TOP_N = 100;
export const MAX_CHART_POINTS = 1000;
export const MAX_SAMPLE_ROWS = 100;

export { summaryCommand } from './summary.js'
export { analyzeCommand } from './analyze.js'
export { periodsCommand } from './periods.js'
export { forecastCommand } from './forecast.js'

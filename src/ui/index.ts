// Route report and the formatters the CLI prints with

export { formatAge, formatEta } from './table'
export { describeRoutes, renderRouteTable } from './route-report'

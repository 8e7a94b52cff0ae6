export { cpeReports } from './reports';

export { AlertLog, type AlertQuery } from './alert-log'

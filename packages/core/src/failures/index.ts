export { createDownHostLog, type DownHostLog } from './down-host-log.js'

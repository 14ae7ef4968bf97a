/**
 * Bridge Configuration Exports
 */

export { bridgeConfig } from './bridge.config';
export type { BridgeConfig } from './bridge.config';
export {
  harmonyMarkers,
  bracketMarkers,
  markerTables,
  getMarkerTable,
  isParameterized,
  validateMarkerTable,
} from './markers.config';

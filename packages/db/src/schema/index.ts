export { gameSession } from "./game-session.js";
export { entity } from "./entity.js";
export { needValue } from "./need-value.js";
export { needModifier } from "./need-modifier.js";
export { needAdaptation } from "./need-adaptation.js";
export { characterPreferences } from "./character-preferences.js";
export { terrainZone } from "./terrain-zone.js";
export { zoneConnection } from "./zone-connection.js";
export { location } from "./location.js";
export { transportMode } from "./transport-mode.js";
export { locationDiscovery, zoneDiscovery } from "./discovery.js";
export { journey, type PendingCheckColumn } from "./journey.js";

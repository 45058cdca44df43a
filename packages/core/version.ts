/** The version reported to the telemetry providers */
export const URLMAP_VERSION = "0.1.0"

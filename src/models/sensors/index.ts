import "./presets";

export type { Device, SensorPreset } from "./registry";
export { SENSORS, registerSensor, getSensor, listSensors, requireSensor, extractSensor } from "./registry";

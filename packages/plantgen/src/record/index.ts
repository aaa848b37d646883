export {
  PLANT_RECORD_VERSION,
  decodePlantRecord,
  encodePlantRecord,
  isPlantRecord,
  packPlantRecord,
  unpackPlantRecord,
  validatePlantRecord,
} from "./PlantRecord.js";
export type { PlantRecord } from "./PlantRecord.js";
export type { PlantRecordValidationResult } from "./validation.js";

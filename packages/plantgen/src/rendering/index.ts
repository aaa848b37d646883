export { renderPlant } from "./PlantRenderer.js";

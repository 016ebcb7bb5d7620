export { useClassifierStats } from "./useClassifierStats.js";

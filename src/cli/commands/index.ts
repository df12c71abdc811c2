export { simulateCommand } from "./simulate.js";

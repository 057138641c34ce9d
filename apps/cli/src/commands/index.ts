export { createScanCommand } from "./scan.js";
export { createListCommand } from "./list.js";
export { createValidateCommand } from "./validate.js";

export { createCellGrid } from "./cellGrid.js";
export type { CellGrid, CellGridOptions, CellWrite, GridCell } from "./cellGrid.js";

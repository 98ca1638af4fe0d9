export { runBootstrapHandler, COMFYUI_URL } from './run-bootstrap.js';
export { listCatalogHandler } from './list-catalog.js';
export { showInventoryHandler } from './show-inventory.js';

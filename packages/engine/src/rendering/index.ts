export { renderMaterials } from './renderMaterials'
export { renderThermal, temperatureToColor, HEATMAP_ANCHORS } from './heatmap'

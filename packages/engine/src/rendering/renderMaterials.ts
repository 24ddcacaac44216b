import { lookup } from '../elements'

export function renderMaterials(args: {
  pixels32: Uint32Array
  ids: Uint8Array
  width: number
  height: number
}): void {
  const { pixels32, ids, width, height } = args

  const len = Math.min(ids.length, width * height)

  for (let i = 0; i < len; i++) {
    pixels32[i] = lookup(ids[i]).color
  }
}

export {
  toThreeAddressCode,
  generateThreeAddressCode,
  createTempCounter,
  type TempCounter,
  type TacFragment,
} from "./lib/three-address";
export { splitLine, joinLine, isTemp, tempsIn, type TacLine } from "./lib/line";

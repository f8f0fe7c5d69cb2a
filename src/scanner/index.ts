export { StructureScanner, findStructures } from "@/scanner/structure-scanner"
export { sliceNode, type StructureKind, type StructureNode, type ScanFrame } from "@/scanner/types"

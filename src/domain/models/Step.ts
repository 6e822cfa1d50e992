export interface InstructionStep {
  id: string
  order: number
  text: string
}

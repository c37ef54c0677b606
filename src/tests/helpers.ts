import { MachineError } from '../components/MachineError'

/**
 * Run fn and return the MachineError it throws, if any
 */
export const catchFault = (fn: () => void): MachineError | undefined => {
  try {
    fn()
  } catch (error) {
    if (error instanceof MachineError) { return error }
    throw error
  }
  return undefined
}

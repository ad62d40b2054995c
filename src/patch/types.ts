import type { FormKey } from "../loadOrder/types.js";

export type PatchInstruction = {
  formKey: FormKey;
  originalName: string;
  newName: string;
};

/**
 * Write side of the patch. Implementations create one copy-on-write
 * override per book and never revisit it within a run.
 */
export interface PatchWriter {
  setBookName(instruction: PatchInstruction): void;
}

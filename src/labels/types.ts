export type Label = {
  id: string;
  name: string;
};

/** Entity kinds that carry a label-id list. */
export const LABELLED_KINDS = ["Task", "Note"] as const;
export type LabelledKind = (typeof LABELLED_KINDS)[number];

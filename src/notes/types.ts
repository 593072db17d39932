// ---------------------------------------------------------------------------
// Note Types
// ---------------------------------------------------------------------------

export type Note = {
  id: string;
  title: string;
  content: string;
  createdAt: string;
  lastModifiedAt: string;
  labelIds: string[];
};

export type NoteCreateInput = {
  title: string;
  content?: string | null;
};

// ---------------------------------------------------------------------------
// Reminder Types
// ---------------------------------------------------------------------------

export const REMINDER_TARGET_KINDS = ["Task", "Note"] as const;
export type ReminderTargetKind = (typeof REMINDER_TARGET_KINDS)[number];

/** The entity a reminder points at. Fixed once the reminder exists. */
export type ReminderTarget = { kind: "Task"; id: string } | { kind: "Note"; id: string };

export type Reminder = {
  id: string;
  message: string;
  reminderTime: string;
  target: ReminderTarget;
  dismissed: boolean;
};

export type ReminderCreateInput = {
  message: string;
  reminderTime: Date | string;
  target: ReminderTarget;
};

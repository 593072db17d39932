// ---------------------------------------------------------------------------
// ReminderService – reminders on tasks and notes
// ---------------------------------------------------------------------------
// The target is checked once, at creation. A reminder whose task or note is
// later deleted stays in place and keeps its (now dangling) target.
// ---------------------------------------------------------------------------

import type { Note } from "../notes/types.js";
import type { EntityStore } from "../store/entity-store.js";
import { NotFoundError } from "../store/errors.js";
import { requireId, requireOneOf, requireText, requireTimestamp } from "../store/validate.js";
import type { Task } from "../tasks/types.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import {
  REMINDER_TARGET_KINDS,
  type Reminder,
  type ReminderCreateInput,
  type ReminderTarget,
} from "./types.js";

/** Builds a target from an untyped kind tag, e.g. one typed at a prompt. */
export function parseReminderTarget(kind: string, id: string): ReminderTarget {
  const checked = requireOneOf(kind, REMINDER_TARGET_KINDS, "reminder target kind");
  return { kind: checked, id: requireId(id, checked) };
}

export class ReminderService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly reminders: EntityStore<Reminder>,
    private readonly tasks: EntityStore<Task>,
    private readonly notes: EntityStore<Note>,
  ) {
    super(deps);
  }

  create(input: ReminderCreateInput): Reminder {
    const message = requireText(input.message, "reminder message");
    const reminderTime = requireTimestamp(input.reminderTime, "reminder time");
    const target = parseReminderTarget(input.target.kind, input.target.id);

    const store = target.kind === "Task" ? this.tasks : this.notes;
    if (!store.has(target.id)) {
      throw new NotFoundError(target.kind, target.id);
    }

    const reminder: Reminder = {
      id: this.deps.ids.next(),
      message,
      reminderTime,
      target,
      dismissed: false,
    };
    this.reminders.save(reminder);

    this.emit("reminder.created", reminder);
    this.deps.log.info(
      `reminder created: ${reminder.id} for ${target.kind} ${target.id} at ${reminderTime}`,
    );
    return reminder;
  }

  get(reminderId: string): Reminder | undefined {
    return this.reminders.findById(requireId(reminderId, "Reminder"));
  }

  list(): Reminder[] {
    return this.reminders.findAll();
  }

  listForEntity(entityId: string): Reminder[] {
    requireId(entityId, "entity");
    return this.reminders.findAll().filter((r) => r.target.id === entityId);
  }

  /** Non-dismissed reminders with reminderTime <= asOf. Full scan. */
  getDue(asOf: Date | string): Reminder[] {
    const cutoff = Date.parse(requireTimestamp(asOf, "as-of time"));
    return this.reminders
      .findAll()
      .filter((r) => !r.dismissed && Date.parse(r.reminderTime) <= cutoff);
  }

  updateMessage(reminderId: string, message: string): Reminder {
    requireText(message, "reminder message");
    const reminder = this.require(reminderId);
    reminder.message = message;
    return this.commit(reminder, "reminder.updated");
  }

  updateTime(reminderId: string, reminderTime: Date | string): Reminder {
    const time = requireTimestamp(reminderTime, "reminder time");
    const reminder = this.require(reminderId);
    reminder.reminderTime = time;
    return this.commit(reminder, "reminder.updated");
  }

  dismiss(reminderId: string): Reminder {
    const reminder = this.require(reminderId);
    reminder.dismissed = true;
    return this.commit(reminder, "reminder.dismissed");
  }

  delete(reminderId: string): boolean {
    const removed = this.reminders.deleteById(requireId(reminderId, "Reminder"));
    if (removed) {
      this.emit("reminder.deleted", { id: reminderId });
      this.deps.log.info(`reminder deleted: ${reminderId}`);
    }
    return removed;
  }

  private require(reminderId: string): Reminder {
    const reminder = this.get(reminderId);
    if (!reminder) {
      throw new NotFoundError("Reminder", reminderId);
    }
    return reminder;
  }

  private commit(reminder: Reminder, event: string): Reminder {
    this.reminders.save(reminder);
    this.emit(event, reminder);
    return reminder;
  }
}

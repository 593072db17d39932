import type { Label } from "../labels/types.js";
import type { Note } from "../notes/types.js";
import type { Project } from "../projects/types.js";
import type { Reminder } from "../reminders/types.js";
import { EntityStore } from "../store/entity-store.js";
import type { Task } from "../tasks/types.js";
import type { User } from "../users/types.js";

/** The six stores, owned together by one tracker. */
export type TrackerStores = {
  users: EntityStore<User>;
  tasks: EntityStore<Task>;
  notes: EntityStore<Note>;
  projects: EntityStore<Project>;
  reminders: EntityStore<Reminder>;
  labels: EntityStore<Label>;
};

export function createStores(): TrackerStores {
  return {
    users: new EntityStore<User>("User"),
    tasks: new EntityStore<Task>("Task"),
    notes: new EntityStore<Note>("Note"),
    projects: new EntityStore<Project>("Project"),
    reminders: new EntityStore<Reminder>("Reminder"),
    labels: new EntityStore<Label>("Label"),
  };
}

import { StoreData, TaskList } from './types';
import { DONE_MARKER } from './constants';

const copyList = (list: TaskList): TaskList => ({
    tasks: [...list.tasks],
    reminder: list.reminder,
});

/**
 * In-memory mapping of list title -> TaskList.
 * Pure state: no I/O and no scheduling. Mutators report whether the target
 * list existed instead of throwing; callers validate input beforehand.
 */
export class ListStore {
    private lists: Map<string, TaskList>;

    constructor(data: StoreData = {}) {
        this.lists = new Map(Object.entries(data).map(([title, list]) => [title, copyList(list)]));
    }

    get size(): number {
        return this.lists.size;
    }

    has(title: string): boolean {
        return this.lists.has(title);
    }

    /**
     * Returns a copy of the list, so callers cannot mutate the store behind its back
     */
    get(title: string): TaskList | undefined {
        const list = this.lists.get(title);
        return list ? copyList(list) : undefined;
    }

    /** Titles in insertion order */
    titles(): string[] {
        return Array.from(this.lists.keys());
    }

    /**
     * Titles of lists whose reminder field is non-empty
     */
    titlesWithReminder(): string[] {
        const titles: string[] = [];
        this.lists.forEach((list, title) => {
            if (list.reminder) titles.push(title);
        });
        return titles;
    }

    create(title: string): boolean {
        if (this.lists.has(title)) {
            return false;
        }
        this.lists.set(title, { tasks: [], reminder: '' });
        return true;
    }

    delete(title: string): TaskList | undefined {
        const list = this.lists.get(title);
        if (!list) {
            return undefined;
        }
        this.lists.delete(title);
        return list;
    }

    /**
     * Moves a list to a new title. The renamed list goes to the end of the order.
     * @returns false if the old title is missing or the new one is taken
     */
    rename(oldTitle: string, newTitle: string): boolean {
        const list = this.lists.get(oldTitle);
        if (!list || this.lists.has(newTitle)) {
            return false;
        }
        this.lists.delete(oldTitle);
        this.lists.set(newTitle, list);
        return true;
    }

    addTask(title: string, text: string): boolean {
        const list = this.lists.get(title);
        if (!list) {
            return false;
        }
        list.tasks.push(text);
        return true;
    }

    /**
     * @returns the removed task text, or undefined when the list or index is missing
     */
    removeTask(title: string, index: number): string | undefined {
        const list = this.lists.get(title);
        if (!list || !Number.isInteger(index) || index < 0 || index >= list.tasks.length) {
            return undefined;
        }
        return list.tasks.splice(index, 1)[0];
    }

    setReminder(title: string, reminder: string): boolean {
        const list = this.lists.get(title);
        if (!list) {
            return false;
        }
        list.reminder = reminder;
        return true;
    }

    clearReminder(title: string): boolean {
        return this.setReminder(title, '');
    }

    /**
     * Prefixes every not-yet-marked task with the done marker and clears the reminder
     */
    markDone(title: string): boolean {
        const list = this.lists.get(title);
        if (!list) {
            return false;
        }
        list.tasks = list.tasks.map((task) => (task.startsWith(DONE_MARKER) ? task : `${DONE_MARKER}${task}`));
        list.reminder = '';
        return true;
    }

    /**
     * Replaces the whole mapping, e.g. after loading from disk
     */
    replaceAll(data: StoreData): void {
        this.lists = new Map(Object.entries(data).map(([title, list]) => [title, copyList(list)]));
    }

    /**
     * Deep copy of the whole mapping, in insertion order
     */
    toJSON(): StoreData {
        const data: StoreData = {};
        this.lists.forEach((list, title) => {
            data[title] = copyList(list);
        });
        return data;
    }
}

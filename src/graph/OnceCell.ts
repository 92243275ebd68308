/**
 * Holds a value built on first use and kept for the owner's lifetime.
 * Nodes keep their spatial indexes in one of these.
 */
export class OnceCell<T> {
    private slot: { value: T } | null = null

    get initialized(): boolean {
        return this.slot !== null
    }

    getOrInit(init: () => T): T {
        if (this.slot === null) {
            this.slot = { value: init() }
        }
        return this.slot.value
    }
}

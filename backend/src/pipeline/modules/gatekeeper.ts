// Drops repeated batch ids, ignoring case and padding; first spelling wins
export class Gatekeeper {
    private seen: Set<string> = new Set();

    public unique(keys: string[]): string[] {
        return keys.filter(key => {
            const normalized = key.trim().toUpperCase();
            if (this.seen.has(normalized)) return false;
            this.seen.add(normalized);
            return true;
        });
    }
}

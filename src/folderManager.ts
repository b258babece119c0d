import Nylas, { Folder } from 'nylas';
import { MailApiError } from './errors';

const TRASH_ATTRIBUTES = ['\\trash', 'trash'];

function isTrash(folder: Folder): boolean {
    if ((folder.attributes ?? []).some(attr => TRASH_ATTRIBUTES.includes(attr.toLowerCase()))) return true;
    return folder.id.toUpperCase() === 'TRASH' || folder.name.toUpperCase() === 'TRASH';
}

/**
 * Gmail labels surface as folders on the grant. Keeps a name→folder cache
 * built once and refreshed on a miss.
 */
export class FolderDirectory {
    private folders: Promise<Folder[]> | null = null;

    constructor(private nylas: Nylas, private grantId: string) {}

    private load(refresh = false): Promise<Folder[]> {
        if (!this.folders || refresh) {
            const pending = this.nylas.folders.list({ identifier: this.grantId }).then(r => r.data);
            // A failed listing must not poison the cache
            this.folders = pending.catch(error => {
                this.folders = null;
                throw error;
            });
        }
        return this.folders;
    }

    async namesById(): Promise<Map<string, string>> {
        const folders = await this.load();
        return new Map(folders.map(f => [f.id, f.name || f.id]));
    }

    async findByName(name: string): Promise<Folder | undefined> {
        const wanted = name.toLowerCase();
        const match = (folders: Folder[]) => folders.find(f => (f.name || '').toLowerCase() === wanted || f.id.toLowerCase() === wanted);

        const cached = match(await this.load());
        if (cached) return cached;

        // Cache miss → refresh once by fetching the list again
        return match(await this.load(true));
    }

    async getOrCreate(name: string): Promise<Folder> {
        const existing = await this.findByName(name);
        if (existing) return existing;

        const response = await this.nylas.folders.create({
            identifier: this.grantId,
            requestBody: { name }
        });
        this.folders = null;
        return response.data;
    }

    async trashFolderId(): Promise<string> {
        let trash = (await this.load()).find(isTrash);
        if (!trash) trash = (await this.load(true)).find(isTrash);
        if (!trash) {
            throw new MailApiError('Trash folder could not be found for this account.');
        }
        return trash.id;
    }
}

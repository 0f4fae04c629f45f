import type { ContactStore } from './contacts.repository';
import { birthdayWindow } from './birthdays';
import type {
  Contact,
  ContactFilters,
  CreateContactInput,
  UpdateContactInput,
} from '../../connections/db/models/contact.model';
import type { PublicUser } from '../../connections/db/models/user.model';
import { getLogger } from '../../utils/logging';

const log = getLogger('contacts');

export type Owner = Pick<PublicUser, 'id'>;

export type Clock = () => Date;

/**
 * Address-book operations. The owner is always explicit; a contact that
 * belongs to someone else is indistinguishable from one that does not exist.
 */
export class ContactService {
  constructor(
    private readonly store: ContactStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  list(owner: Owner, skip: number, limit: number, filters: ContactFilters = {}): Promise<Contact[]> {
    return this.store.list(owner.id, filters, { skip, limit });
  }

  get(owner: Owner, id: number): Promise<Contact | null> {
    return this.store.findById(owner.id, id);
  }

  async create(owner: Owner, data: CreateContactInput): Promise<Contact> {
    const contact = await this.store.create(owner.id, data);
    log.info('Contact created', { userId: owner.id, contactId: contact.id });
    return contact;
  }

  async update(owner: Owner, id: number, patch: UpdateContactInput): Promise<Contact | null> {
    const provided = Object.values(patch).some((value) => value !== undefined);
    if (!provided) {
      return this.store.findById(owner.id, id);
    }
    return this.store.update(owner.id, id, patch);
  }

  async remove(owner: Owner, id: number): Promise<Contact | null> {
    const removed = await this.store.remove(owner.id, id);
    if (removed) {
      log.info('Contact removed', { userId: owner.id, contactId: id });
    }
    return removed;
  }

  upcomingBirthdays(owner: Owner, skip: number, limit: number): Promise<Contact[]> {
    return this.store.upcomingBirthdays(owner.id, birthdayWindow(this.clock()), { skip, limit });
  }
}

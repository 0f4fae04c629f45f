// Contact Model - Based on migration 20250601_000002_create_contacts_table

export interface Contact {
  id: number;
  user_id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string;
  /** Calendar date, YYYY-MM-DD */
  birthday: string;
  extra_info: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateContactInput {
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string;
  birthday: string;
  extra_info?: string | null;
}

export type UpdateContactInput = Partial<CreateContactInput>;

export interface ContactFilters {
  first_name?: string;
  last_name?: string;
  email?: string;
}

export interface Pagination {
  skip: number;
  limit: number;
}

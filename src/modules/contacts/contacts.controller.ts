import type { Response, NextFunction } from 'express';
import type { AuthRequest } from '../../types/request.types';
import type { Contact } from '../../connections/db/models/contact.model';
import { getScope } from '../../middlewares/scope.middleware';
import { getCurrentUser } from '../../middlewares/auth.middleware';
import {
  createContactSchema,
  updateContactSchema,
  contactIdParamsSchema,
  listContactsQuerySchema,
  upcomingBirthdaysQuerySchema,
} from './contacts.validation';
import { NotFoundError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';

const CONTACT_NOT_FOUND = 'Contact is not found';

const found = (contact: Contact | null): Contact => {
  if (!contact) {
    throw new NotFoundError(CONTACT_NOT_FOUND);
  }
  return contact;
};

export const listContacts = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { skip, limit, ...filters } = listContactsQuerySchema.parse(req.query);
    const contacts = await getScope(req).contacts.list(getCurrentUser(req), skip, limit, filters);

    ResponseHandler.success(res, contacts, 'Success', 200, { skip, limit, count: contacts.length });
  } catch (error: unknown) {
    next(error);
  }
};

export const upcomingBirthdays = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { skip, limit } = upcomingBirthdaysQuerySchema.parse(req.query);
    const contacts = await getScope(req).contacts.upcomingBirthdays(getCurrentUser(req), skip, limit);

    ResponseHandler.success(res, contacts, 'Success', 200, { skip, limit, count: contacts.length });
  } catch (error: unknown) {
    next(error);
  }
};

export const getContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { id } = contactIdParamsSchema.parse(req.params);
    const contact = found(await getScope(req).contacts.get(getCurrentUser(req), id));

    ResponseHandler.success(res, contact);
  } catch (error: unknown) {
    next(error);
  }
};

export const createContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const validated = createContactSchema.parse(req.body);
    const contact = await getScope(req).contacts.create(getCurrentUser(req), validated);

    ResponseHandler.created(res, contact, 'Contact created');
  } catch (error: unknown) {
    next(error);
  }
};

export const updateContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { id } = contactIdParamsSchema.parse(req.params);
    const patch = updateContactSchema.parse(req.body);
    const contact = found(await getScope(req).contacts.update(getCurrentUser(req), id, patch));

    ResponseHandler.success(res, contact, 'Contact updated');
  } catch (error: unknown) {
    next(error);
  }
};

export const deleteContact = async (req: AuthRequest, res: Response, next: NextFunction) => {
  try {
    const { id } = contactIdParamsSchema.parse(req.params);
    const contact = found(await getScope(req).contacts.remove(getCurrentUser(req), id));

    ResponseHandler.success(res, contact, 'Contact deleted');
  } catch (error: unknown) {
    next(error);
  }
};

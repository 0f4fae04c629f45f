import express from 'express';
import * as contactsController from './contacts.controller';
import { authenticate } from '../../middlewares/auth.middleware';

export const createContactsRouter = () => {
  const router = express.Router();

  router.use(authenticate);

  router.get('/', contactsController.listContacts);

  // Registered ahead of /:id so it is not read as an id
  router.get('/upcoming-birthdays', contactsController.upcomingBirthdays);

  router.get('/:id', contactsController.getContact);
  router.post('/', contactsController.createContact);
  router.put('/:id', contactsController.updateContact);
  router.delete('/:id', contactsController.deleteContact);

  return router;
};

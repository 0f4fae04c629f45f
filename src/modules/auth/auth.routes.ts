import express from 'express';
import * as authController from './auth.controller';

export const createAuthRouter = () => {
  const router = express.Router();

  router.post('/register', authController.register);

  // JSON body or application/x-www-form-urlencoded
  router.post('/login', authController.login);

  router.get('/confirmed_email/:token', authController.confirmEmail);

  router.post('/request_email', authController.requestEmail);

  return router;
};

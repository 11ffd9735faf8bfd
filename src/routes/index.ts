import { Router } from 'express';
import { MessagesController } from '../controllers/MessagesController';
import { CategoriesController } from '../controllers/CategoriesController';
import { BootstrapController } from '../controllers/BootstrapController';
import { AppServices } from '../services';

/**
 * Configure all API routes
 */
export function createRoutes(services: AppServices): Router {
  const router = Router();

  const messagesController = new MessagesController(services.messagesService, services.classificationService);
  const categoriesController = new CategoriesController(services.categoriesService);
  const bootstrapController = new BootstrapController(services.bootstrapService);

  // Category routes
  router.post('/categories', categoriesController.createCategory.bind(categoriesController));
  router.get('/categories', categoriesController.listCategories.bind(categoriesController));
  router.get('/categories/:id', categoriesController.getCategory.bind(categoriesController));
  router.put('/categories/:id', categoriesController.updateCategory.bind(categoriesController));
  router.delete('/categories/:id', categoriesController.deleteCategory.bind(categoriesController));
  router.get('/categories/:id/messages', categoriesController.listCategoryMessages.bind(categoriesController));

  // Message routes
  router.post('/messages', messagesController.createMessage.bind(messagesController));
  router.get('/messages', messagesController.listMessages.bind(messagesController));
  router.get('/messages/:id', messagesController.getMessage.bind(messagesController));
  router.put('/messages/:id', messagesController.updateMessage.bind(messagesController));
  router.delete('/messages/:id', messagesController.deleteMessage.bind(messagesController));
  router.post('/messages/:id/classify', messagesController.classifyMessage.bind(messagesController));

  // Bootstrap
  router.post('/bootstrap', bootstrapController.bootstrap.bind(bootstrapController));

  return router;
}

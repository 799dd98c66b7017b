import express from "express";
import catalogController from "../../controllers/catalog.controller";

const router = express.Router();

router.post("/import", catalogController.importCatalog);

export default router;

import winston from "winston";
import {logger} from "../src/util";

// Tests log nowhere unless they spy on the logger
logger.add(new winston.transports.Console({silent: true}));

/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { carSchema } from '../models.js';
import { bindModel } from '../pipeline/binding.js';
import { HttpHandler, json } from '../pipeline/handlers.js';

export const submitCar: HttpHandler = bindModel(carSchema, (car) => json(car));

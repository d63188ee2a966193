import express from 'express';
import cors from 'cors';
import { config } from './config/env';
import authRouter from './routes/auth';
import jobRouter from './routes/jobs';
import applicationRouter from './routes/applications';
import savedJobRouter from './routes/savedJobs';
import profileRouter from './routes/profiles';
import employerRouter from './routes/employer';
import adminRouter from './routes/admin';
import { errorHandler, notFound } from './middleware/error.middleware';

export const createApp = () => {
    const app = express();
    //cross origin middleware
    app.use(cors({
        origin: config.corsOrigins,
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    }));

    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    app.get('/api/health', (req, res) => {
        res.json({ status: 'ok' });
    });

    //router handlers
    app.use('/api/auth', authRouter);
    app.use('/api/jobs', jobRouter);
    app.use('/api/applications', applicationRouter);
    app.use('/api/saved-jobs', savedJobRouter);
    app.use('/api/profiles', profileRouter);
    app.use('/api/employer', employerRouter);
    app.use('/api/admin', adminRouter);

    app.use(notFound);
    app.use(errorHandler);
    return app;
};

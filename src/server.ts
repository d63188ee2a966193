import mongoose from 'mongoose';
import { createApp } from './app';
import { config } from './config/env';
import { seedAdmin } from './util/seedAdmin';

const start = async () => {
    //checking for mongoose url
    if (!config.mongoUri) {
        throw new Error("MONGO_URI is not defined in your .env file")
    }
    await mongoose.connect(config.mongoUri);
    console.log("Database connections successful");

    // unique indexes back the email and one-per-user rules
    await mongoose.syncIndexes();
    await seedAdmin();

    const app = createApp();
    //listening port
    app.listen(config.port, (err) => {
        if (err) {
            console.error("Error starting server:", err);
            process.exit(1);
        }
        console.log(`server running on port:${config.port}`)
    });
};

start().catch((err) => {
    console.error("Database connection failed", err);
    process.exit(1);
});

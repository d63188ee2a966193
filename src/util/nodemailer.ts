import nodemailer from "nodemailer";
import { config } from "../config/env";

const { host, port, secure, user, pass } = config.mail;

export const transport = nodemailer.createTransport({
  host,
  port,
  secure,
  auth: {
    user,
    pass
  }
});

export const getMailOptions = (userEmail: string, userName: string, token: string) => {
  const confirmationUrl = `${config.clientUrl}/verify-email?token=${token}`;

  return {
    from: `"Job Board" <${user}>`,
    to: userEmail,
    subject: "Verify your email to start using Job Board",
    html: `
   <div style="font-family:sans-serif; padding:20px; max-width:560px;">
    <h2>Hi ${userName},</h2>
    <p>Confirm this address to sign in, apply for jobs and get replies from employers.</p>
    <p><a href="${confirmationUrl}" style="padding:10px 15px; background:#0F766E; color:white; text-decoration:none; border-radius:5px;">Confirm my email</a></p>
    <p>The button works for 24 hours. After that, request a fresh link from the sign-in page.</p>
    <p style="color:#6B7280; font-size:12px;">You are receiving this because ${userEmail} was used to create a Job Board account.</p>
  </div>
    `,
  };
};

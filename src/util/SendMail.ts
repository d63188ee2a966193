import { getMailOptions, transport } from "./nodemailer"

type MailParams = {
    userEmail: string;
    userName: string;
    token: string;
}

export const sendConfirmationMail = async ({ userEmail, userName, token }: MailParams) => {
    const mailOptions = getMailOptions(userEmail, userName, token)
    await transport.sendMail(mailOptions)
}

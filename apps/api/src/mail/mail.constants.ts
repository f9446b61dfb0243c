/** Injection token for the nodemailer transport used by MailService */
export const MAIL_TRANSPORT = 'MAIL_TRANSPORT';

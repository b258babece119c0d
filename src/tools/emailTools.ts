import { MailMessage } from '../types';
import { defineTool } from './registry';
import {
  DeleteEmailsPermanentlyInput,
  DeleteEmailsPermanentlyOutput,
  GetEmailDetailsInput,
  GetEmailDetailsOutput,
  LabelEmailsInput,
  ListEmailsInput,
  ListEmailsOutput,
  MarkEmailsInput,
  ModifyEmailsOutput,
  TrashEmailsInput,
  TrashEmailsOutput
} from './schemas';

function toSummary(message: MailMessage) {
  return {
    id: message.id,
    thread_id: message.threadId,
    subject: message.subject,
    from: message.from,
    snippet: message.snippet,
    date: message.date,
    has_attachments: message.hasAttachments,
    label_ids: message.labels
  };
}

export const listEmails = defineTool({
  name: 'damien_list_emails',
  inputSchema: ListEmailsInput,
  outputSchema: ListEmailsOutput,
  mutating: false,
  session: 'record',
  async execute(input, ctx) {
    const mail = await ctx.mail();
    const page = await mail.listMessages({
      query: input.query,
      maxResults: input.max_results,
      pageToken: input.page_token
    });
    return {
      email_summaries: page.messages.map(toSummary),
      next_page_token: page.nextPageToken
    };
  },
  updateSession(state, input, output) {
    return {
      ...state,
      list_emails_cursor: {
        query: input.query ?? null,
        page_token: input.page_token ?? null,
        next_page_token: output.next_page_token ?? null
      }
    };
  }
});

export const getEmailDetails = defineTool({
  name: 'damien_get_email_details',
  inputSchema: GetEmailDetailsInput,
  outputSchema: GetEmailDetailsOutput,
  mutating: false,
  session: 'none',
  async execute(input, ctx) {
    const mail = await ctx.mail();
    const message = await mail.getMessage(input.message_id, input.format);
    return {
      id: message.id,
      thread_id: message.threadId,
      label_ids: message.labels,
      snippet: message.snippet,
      subject: message.subject,
      from: message.from,
      to: message.to,
      date: message.date,
      internal_date: message.internalDate,
      is_unread: message.unread,
      headers: message.headers,
      body: message.body,
      raw: message.raw
    };
  }
});

export const trashEmails = defineTool({
  name: 'damien_trash_emails',
  inputSchema: TrashEmailsInput,
  outputSchema: TrashEmailsOutput,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const mail = await ctx.mail();
    await mail.trashMessages(input.message_ids);
    const count = input.message_ids.length;
    ctx.logger.info(`Moved ${count} email(s) to trash`);
    return {
      trashed_count: count,
      status_message: `Successfully moved ${count} email(s) to trash.`
    };
  }
});

export const labelEmails = defineTool({
  name: 'damien_label_emails',
  inputSchema: LabelEmailsInput,
  outputSchema: ModifyEmailsOutput,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const add = input.add_label_names ?? [];
    const remove = input.remove_label_names ?? [];
    const mail = await ctx.mail();
    await mail.modifyLabels(input.message_ids, add, remove);

    const count = input.message_ids.length;
    let status = `Successfully modified labels on ${count} email(s).`;
    if (add.length > 0) status += ` Added: ${add.join(', ')}.`;
    if (remove.length > 0) status += ` Removed: ${remove.join(', ')}.`;
    return { modified_count: count, status_message: status };
  }
});

export const markEmails = defineTool({
  name: 'damien_mark_emails',
  inputSchema: MarkEmailsInput,
  outputSchema: ModifyEmailsOutput,
  mutating: true,
  session: 'record',
  async execute(input, ctx) {
    const mail = await ctx.mail();
    await mail.markMessages(input.message_ids, input.mark_as);
    const count = input.message_ids.length;
    return {
      modified_count: count,
      status_message: `Successfully marked ${count} email(s) as ${input.mark_as}.`
    };
  }
});

export const deleteEmailsPermanently = defineTool({
  name: 'damien_delete_emails_permanently',
  inputSchema: DeleteEmailsPermanentlyInput,
  outputSchema: DeleteEmailsPermanentlyOutput,
  mutating: true,
  destructive: true,
  session: 'record',
  async execute(input, ctx) {
    const mail = await ctx.mail();
    await mail.deleteMessagesPermanently(input.message_ids);
    const count = input.message_ids.length;
    return {
      deleted_count: count,
      status_message: `Permanently deleted ${count} email(s).`
    };
  }
});

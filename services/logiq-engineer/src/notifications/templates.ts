export interface AssignmentNotice {
  customerName: string;
  serviceRequestId: string;
  engineerId: string;
  engineerName: string;
  engineerPhone: string;
  engineerEmail: string;
}

export interface ResolutionStartedNotice {
  customerName: string;
  serviceRequestId: string;
  engineerId: string;
  engineerName: string;
}

export interface ResolvedNotice {
  customerName: string;
  serviceRequestId: string;
  engineerId: string;
  engineerName: string;
  actionPerformed: string;
  additionalNotes: string;
}

export interface RenderedNotice {
  subject: string;
  html: string;
  sms: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function layout(customerName: string, body: string): string {
  return [
    `<p>Dear ${escapeHtml(customerName)},</p>`,
    body,
    '<p>Regards,<br>Team LogIQ</p>',
  ].join('\n');
}

export function engineerAssigned(notice: AssignmentNotice): RenderedNotice {
  const id = escapeHtml(notice.serviceRequestId);
  return {
    subject: `Engineer assigned to your service request #${notice.serviceRequestId}`,
    html: layout(
      notice.customerName,
      `<p>${escapeHtml(notice.engineerName)} (Engineer Id: ${escapeHtml(notice.engineerId)}) has been assigned to your onsite service request <b>#${id}</b>.</p>` +
        `<p>You can reach them at ${escapeHtml(notice.engineerPhone)} or ${escapeHtml(notice.engineerEmail)}.</p>`
    ),
    sms:
      `LogIQ: ${notice.engineerName} (ID ${notice.engineerId}) has been assigned to your service request ` +
      `#${notice.serviceRequestId}.`,
  };
}

export function resolutionStarted(notice: ResolutionStartedNotice): RenderedNotice {
  return {
    subject: `Work has started on service request #${notice.serviceRequestId}`,
    html: layout(
      notice.customerName,
      `<p>${escapeHtml(notice.engineerName)} (Engineer Id: ${escapeHtml(notice.engineerId)}) has been verified and started working on service request <b>#${escapeHtml(notice.serviceRequestId)}</b>.</p>`
    ),
    sms:
      `LogIQ: ${notice.engineerName} (ID ${notice.engineerId}) has started working on your service request ` +
      `#${notice.serviceRequestId}.`,
  };
}

export function requestResolved(notice: ResolvedNotice): RenderedNotice {
  const notes = notice.additionalNotes ? `<p>${escapeHtml(notice.additionalNotes)}</p>` : '';
  return {
    subject: `Service request #${notice.serviceRequestId} resolved`,
    html: layout(
      notice.customerName,
      `<p>Your service request <b>#${escapeHtml(notice.serviceRequestId)}</b> has been resolved by ${escapeHtml(notice.engineerName)} (Engineer Id: ${escapeHtml(notice.engineerId)}).</p>` +
        `<p><b>Action performed:</b> ${escapeHtml(notice.actionPerformed)}</p>${notes}`
    ),
    sms: `LogIQ: Your service request #${notice.serviceRequestId} has been resolved by ${notice.engineerName}.`,
  };
}

export const DEFAULT_RESPONSE_DESCRIPTIONS: Readonly<Record<string, string>> = Object.freeze({
  '200': 'Success',
  '201': 'Created',
  '202': 'Accepted',
  '204': 'No Content',
  '400': 'Bad Request',
  '401': 'Unauthorized',
  '403': 'Forbidden',
  '404': 'Not Found',
  '405': 'Method Not Allowed',
  '406': 'Not Acceptable',
  '429': 'Too Many Requests',
  '500': 'Server Error'
});

export { ContactDto } from './contact.dto';
export { ContactResponseDto } from './contact-response.dto';
export { ListContactsQueryDto } from './list-contacts-query.dto';
export { PaginationQueryDto } from './pagination-query.dto';

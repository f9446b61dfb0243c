import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { JwtAuthGuard } from '../auth/guards';
import { CurrentUser } from '../auth/decorators';
import type { RequestUser } from '../auth/interfaces';
import { RateLimit, RateLimitGuard, RateLimitPolicies } from '../rate-limit';
import { ContactsService } from './contacts.service';
import {
  ContactDto,
  ContactResponseDto,
  ListContactsQueryDto,
  PaginationQueryDto,
} from './dto';
import { ContactNotFoundException } from './exceptions/contact.exceptions';

/**
 * ContactsController — the caller's address book.
 *
 * Routes:
 * - GET    /contacts                    → List, optionally filtered (exact match)
 * - GET    /contacts/birthdays          → Contacts with a birthday in the next 7 days
 * - GET    /contacts/:contactId         → One contact
 * - POST   /contacts                    → Create
 * - PUT    /contacts/:contactId         → Replace all fields
 * - DELETE /contacts/:contactId         → Delete
 *
 * Empty results are 404s, contacts of other users included.
 */
@Controller('contacts')
@UseGuards(RateLimitGuard, JwtAuthGuard)
export class ContactsController {
  constructor(private readonly contactsService: ContactsService) {}

  @Get()
  @RateLimit(RateLimitPolicies.READ)
  async list(
    @CurrentUser() user: RequestUser,
    @Query() query: ListContactsQueryDto,
  ): Promise<ContactResponseDto[]> {
    const { skip, limit, firstName, lastName, email } = query;
    const contacts = await this.contactsService.listContacts(
      user.userId,
      { firstName, lastName, email },
      { skip, limit },
    );

    if (contacts.length === 0) {
      throw ContactNotFoundException.forListing();
    }
    return contacts.map((contact) => ContactResponseDto.fromEntity(contact));
  }

  // Declared before ':contactId' so "birthdays" is not parsed as an id
  @Get('birthdays')
  @RateLimit(RateLimitPolicies.READ)
  async birthdays(
    @CurrentUser() user: RequestUser,
    @Query() query: PaginationQueryDto,
  ): Promise<ContactResponseDto[]> {
    const contacts = await this.contactsService.listUpcomingBirthdays(
      user.userId,
      { skip: query.skip, limit: query.limit },
    );

    if (contacts.length === 0) {
      throw ContactNotFoundException.forBirthdays();
    }
    return contacts.map((contact) => ContactResponseDto.fromEntity(contact));
  }

  @Get(':contactId')
  @RateLimit(RateLimitPolicies.READ)
  async findOne(
    @CurrentUser() user: RequestUser,
    @Param('contactId', ParseIntPipe) contactId: number,
  ): Promise<ContactResponseDto> {
    const contact = await this.contactsService.getContact(user.userId, contactId);
    if (!contact) {
      throw new ContactNotFoundException();
    }
    return ContactResponseDto.fromEntity(contact);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RateLimit(RateLimitPolicies.CREATE)
  async create(
    @CurrentUser() user: RequestUser,
    @Body() dto: ContactDto,
  ): Promise<ContactResponseDto> {
    const contact = await this.contactsService.createContact(user.userId, {
      firstName: dto.firstName,
      lastName: dto.lastName,
      email: dto.email,
      phone: dto.phone,
      dateOfBirth: dto.dateOfBirth,
    });
    return ContactResponseDto.fromEntity(contact);
  }

  @Put(':contactId')
  async update(
    @CurrentUser() user: RequestUser,
    @Param('contactId', ParseIntPipe) contactId: number,
    @Body() dto: ContactDto,
  ): Promise<ContactResponseDto> {
    const contact = await this.contactsService.updateContact(
      user.userId,
      contactId,
      {
        firstName: dto.firstName,
        lastName: dto.lastName,
        email: dto.email,
        phone: dto.phone,
        dateOfBirth: dto.dateOfBirth,
      },
    );
    if (!contact) {
      throw new ContactNotFoundException();
    }
    return ContactResponseDto.fromEntity(contact);
  }

  @Delete(':contactId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentUser() user: RequestUser,
    @Param('contactId', ParseIntPipe) contactId: number,
  ): Promise<void> {
    const contact = await this.contactsService.removeContact(
      user.userId,
      contactId,
    );
    if (!contact) {
      throw new ContactNotFoundException();
    }
  }
}

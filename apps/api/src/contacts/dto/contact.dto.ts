import {
  IsEmail,
  IsISO8601,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';

/**
 * Request body for creating or replacing a contact.
 *
 * All fields are required: update is a full replacement, never a patch.
 */
export class ContactDto {
  @IsString()
  @IsNotEmpty({ message: 'First name is required' })
  @MaxLength(50)
  firstName!: string;

  @IsString()
  @IsNotEmpty({ message: 'Last name is required' })
  @MaxLength(50)
  lastName!: string;

  @IsEmail({}, { message: 'Please provide a valid email address' })
  @MaxLength(100)
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Phone is required' })
  @MaxLength(20)
  phone!: string;

  @Matches(/^\d{4}-\d{2}-\d{2}$/, {
    message: 'Date of birth must be a calendar date (YYYY-MM-DD)',
  })
  @IsISO8601({ strict: true }, { message: 'Date of birth is not a valid date' })
  dateOfBirth!: string;
}

// Customer feedback: shop reviews, support requests and courier job applications.

import {Either, Left, Right} from 'purify-ts';
import type {CustomerMessage, MessageKind, Review} from '../domain';
import type {AppEffects} from './effects';
import type {ReviewSummary} from './types';
import {roundMoney} from './businessLogic';
import {parseRequiredText} from './checkout';
import {andThen, invalidInput, OrderError} from './errors';

export const MIN_RATING = 1;
export const MAX_RATING = 5;

export function validateRating(rating: number): Either<OrderError, number> {
  return Number.isInteger(rating) && rating >= MIN_RATING && rating <= MAX_RATING
    ? Right(rating)
    : Left(invalidInput('rating', `must be a whole number from ${MIN_RATING} to ${MAX_RATING}`));
}

export function summarizeReviews(reviews: Review[]): ReviewSummary {
  const averageRating = reviews.length === 0
    ? null
    : roundMoney(reviews.reduce((sum, review) => sum + review.rating, 0) / reviews.length);
  return { count: reviews.length, averageRating, reviews };
}

export function submitReview(
  userId: string,
  rating: number,
  text: string
): (effects: AppEffects) => Promise<Either<OrderError, Review>> {
  return async (effects: AppEffects) => {
    const review = validateRating(rating)
      .chain(validRating => parseRequiredText('text', text).map(validText => ({ rating: validRating, text: validText })));

    return andThen(review, async valid => Right(await effects.feedback.addReview({
      userId,
      rating: valid.rating,
      text: valid.text,
      createdAt: effects.env.now(),
    })));
  };
}

function leaveMessage(
  kind: MessageKind,
  userId: string,
  text: string
): (effects: AppEffects) => Promise<Either<OrderError, CustomerMessage>> {
  return async (effects: AppEffects) =>
    andThen(parseRequiredText('text', text), async valid => Right(await effects.feedback.addMessage({
      kind,
      userId,
      text: valid,
      createdAt: effects.env.now(),
    })));
}

export function submitSupportMessage(
  userId: string,
  text: string
): (effects: AppEffects) => Promise<Either<OrderError, CustomerMessage>> {
  return leaveMessage('support', userId, text);
}

/**
 * A customer asking to work as a courier. The text is kept as written for
 * staff to read; nothing is parsed out of it.
 */
export function submitCourierApplication(
  userId: string,
  text: string
): (effects: AppEffects) => Promise<Either<OrderError, CustomerMessage>> {
  return leaveMessage('courier_application', userId, text);
}

export function listReviews(): (effects: AppEffects) => Promise<ReviewSummary> {
  return async (effects: AppEffects) => summarizeReviews(await effects.feedback.listReviews());
}

export function listSupportMessages(): (effects: AppEffects) => Promise<CustomerMessage[]> {
  return async (effects: AppEffects) => effects.feedback.listMessages('support');
}

export function listCourierApplications(): (effects: AppEffects) => Promise<CustomerMessage[]> {
  return async (effects: AppEffects) => effects.feedback.listMessages('courier_application');
}
